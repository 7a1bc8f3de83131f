import { createContext, sleep } from "effection";
import { expect } from "expect";
import { beforeAll, beforeEach, describe, it } from "./mod.ts";

const Depth = createContext<number>("test.depth", 0);

describe("@solver-diff/bdd", () => {
  let onetime = 0;
  let each = 0;

  beforeAll(function* () {
    onetime++;
  });

  beforeEach(function* () {
    each++;
    yield* Depth.set(1);
  });

  it("runs basic tests", function* () {
    expect(onetime).toEqual(1);
  });

  it("supports Effection operations", function* () {
    yield* sleep(1);
    expect(onetime).toEqual(1);
    expect(each).toEqual(2);
  });

  it("shares context from beforeEach with the test body", function* () {
    expect(yield* Depth.expect()).toEqual(1);
  });

  describe("nested", () => {
    beforeEach(function* () {
      let depth = yield* Depth.expect();
      yield* Depth.set(depth + 1);
    });

    it("runs the setup of every enclosing block, outermost first", function* () {
      expect(yield* Depth.expect()).toEqual(2);
    });
  });
});
