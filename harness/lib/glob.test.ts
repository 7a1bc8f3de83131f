import { describe, it } from "@solver-diff/bdd";
import { expect } from "expect";
import { globMatcher, isGlob, splitGlob } from "./glob.ts";

describe("glob", () => {
  describe("isGlob", () => {
    it("recognizes wildcards, classes and alternation", function* () {
      expect(isGlob("inputs/*.gm")).toBe(true);
      expect(isGlob("inputs/game?.gm")).toBe(true);
      expect(isGlob("inputs/[ab].gm")).toBe(true);
      expect(isGlob("inputs/{a,b}.gm")).toBe(true);
      expect(isGlob("inputs/tests")).toBe(false);
    });
  });

  describe("splitGlob", () => {
    it("starts from the directories before the first wildcard", function* () {
      expect(splitGlob("inputs/tests/*.gm")).toEqual({
        base: "inputs/tests",
        pattern: "*.gm",
      });
      expect(splitGlob("inputs/**/small/*.gm")).toEqual({
        base: "inputs",
        pattern: "**/small/*.gm",
      });
    });

    it("starts from the working directory for a relative wildcard", function* () {
      expect(splitGlob("*.gm")).toEqual({ base: ".", pattern: "*.gm" });
    });

    it("starts from the root for an absolute wildcard", function* () {
      expect(splitGlob("/*.gm")).toEqual({ base: "/", pattern: "*.gm" });
    });
  });

  describe("globMatcher", () => {
    it("does not let * cross directories", function* () {
      let match = globMatcher("*.gm");
      expect(match("a.gm")).toBe(true);
      expect(match("nested/a.gm")).toBe(false);
      expect(match("a.pg")).toBe(false);
    });

    it("lets ** match any number of directories", function* () {
      let match = globMatcher("**/*.gm");
      expect(match("a.gm")).toBe(true);
      expect(match("x/y/a.gm")).toBe(true);
    });

    it("supports alternation and single characters", function* () {
      let match = globMatcher("game?.{gm,pg}");
      expect(match("game1.gm")).toBe(true);
      expect(match("game2.pg")).toBe(true);
      expect(match("game10.gm")).toBe(false);
    });

    it("supports character classes and their negation", function* () {
      expect(globMatcher("[ab].gm")("a.gm")).toBe(true);
      expect(globMatcher("[ab].gm")("c.gm")).toBe(false);
      expect(globMatcher("[!b]*.gm")("a.gm")).toBe(true);
      expect(globMatcher("[!b]*.gm")("b.gm")).toBe(false);
      expect(globMatcher("[^b]*.gm")("b.gm")).toBe(false);
    });
  });
});
