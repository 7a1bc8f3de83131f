import { describe, it } from "@solver-diff/bdd";
import { expect } from "expect";
import type { CaseOutcome, SolverResult } from "../types.ts";
import { formatCase, formatResult, formatSummary } from "./report.ts";

function text(verdict: string): SolverResult {
  return {
    kind: "text",
    verdict,
    raw: Buffer.from(verdict),
    found: verdict !== "",
    code: 0,
  };
}

const a = { id: "a.gm", path: "inputs/a.gm" };
const b = { id: "b.gm", path: "inputs/b.gm" };

describe("report", () => {
  describe("formatResult", () => {
    it("quotes text verdicts", function* () {
      expect(formatResult(text("won by 1\n"))).toEqual('"won by 1\\n"');
    });

    it("marks a missing verdict", function* () {
      expect(formatResult(text(""))).toEqual('"" (no verdict)');
    });

    it("shows exit statuses with their winner", function* () {
      expect(
        formatResult({ kind: "status", code: 0, signal: null, winner: "even" }),
      ).toEqual("exit 0 (even)");
      expect(
        formatResult({
          kind: "status",
          code: null,
          signal: "SIGSEGV",
          winner: "unrecognized",
        }),
      ).toEqual("signal SIGSEGV (unrecognized)");
    });

    it("shows timeouts", function* () {
      expect(formatResult({ kind: "timeout", timeout: 500 })).toEqual(
        "timed out after 500ms",
      );
    });
  });

  describe("formatCase", () => {
    it("prints a passing case on a single short line", function* () {
      let outcome: CaseOutcome = {
        testCase: a,
        comparisons: [{
          matched: true,
          reference: text("won by 0"),
          candidate: text("won by 0"),
        }],
        verifications: [],
        passed: true,
      };
      expect(formatCase(outcome)).toEqual("ok    a.gm");
    });

    it("prints both raw verdicts of a mismatch", function* () {
      let outcome: CaseOutcome = {
        testCase: b,
        comparisons: [{
          matched: false,
          reference: text("won by 1"),
          candidate: text("won by 0"),
        }],
        verifications: [],
        passed: false,
      };
      expect(formatCase(outcome)).toEqual(
        'FAIL  b.gm  reference: "won by 1"  candidate: "won by 0"',
      );
    });

    it("labels comparisons with their algorithm", function* () {
      let outcome: CaseOutcome = {
        testCase: b,
        comparisons: [
          {
            matched: true,
            reference: text("won by 1"),
            candidate: text("won by 1"),
            algorithm: "zielonka",
          },
          {
            matched: false,
            reference: text("won by 1"),
            candidate: text(""),
            algorithm: "fpi",
          },
        ],
        verifications: [],
        passed: false,
      };
      expect(formatCase(outcome)).toEqual(
        'FAIL  b.gm  [fpi] reference: "won by 1"  candidate: "" (no verdict)',
      );
    });

    it("shows unrecognized statuses even when they agree", function* () {
      let crashed: SolverResult = {
        kind: "status",
        code: 3,
        signal: null,
        winner: "unrecognized",
      };
      let outcome: CaseOutcome = {
        testCase: a,
        comparisons: [{ matched: true, reference: crashed, candidate: crashed }],
        verifications: [],
        passed: true,
      };
      expect(formatCase(outcome)).toEqual(
        "ok    a.gm  reference: exit 3 (unrecognized)  candidate: exit 3 (unrecognized)",
      );
    });

    it("gives the reason of a rejected solution", function* () {
      let outcome: CaseOutcome = {
        testCase: a,
        comparisons: [{
          matched: true,
          reference: text("won by 0"),
          candidate: text("won by 0"),
        }],
        verifications: [{
          verified: false,
          reason: "reference rejected the solution with status 1",
        }],
        passed: false,
      };
      expect(formatCase(outcome)).toEqual(
        "FAIL  a.gm  verification failed (reference rejected the solution with status 1)",
      );
    });
  });

  describe("formatSummary", () => {
    it("counts cases and failures", function* () {
      expect(formatSummary({ total: 2, failed: 1, state: "has-mismatch" }))
        .toEqual("2 cases, 1 failed");
      expect(formatSummary({ total: 1, failed: 0, state: "all-matched" }))
        .toEqual("1 case, 0 failed");
    });
  });
});
