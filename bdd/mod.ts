import { after, describe as $describe, it as $it } from "node:test";
import type { Operation } from "effection";
import { createSuite, type Suite, type TestOperation } from "./suite.ts";

export type { TestOperation } from "./suite.ts";

let current: Suite | undefined;

export function describe(name: string, body: () => void): void {
  const original = current;
  try {
    const suite = current = createSuite(name, original);
    $describe(name, () => {
      after(() => suite.destroy());
      body();
    });
  } finally {
    current = original;
  }
}

function expectSuite(fn: string): Suite {
  if (!current) {
    throw new Error(`${fn}() must be called inside of describe()`);
  }
  return current;
}

export function it(desc: string, body: TestOperation): void {
  const suite = expectSuite("it");
  $it(desc, async () => {
    const result = await suite.runTest(body);
    if (!result.ok) {
      throw result.error;
    }
  });
}

/**
 * Run `body` once, before the first test of the enclosing `describe()`.
 * Resources it creates stay alive until every test in the block is done.
 */
export function beforeAll(body: () => Operation<void>): void {
  expectSuite("beforeAll").addOnetimeSetup(body);
}

/**
 * Run `body` before every test of the enclosing `describe()`, in the same
 * scope as the test, so context it sets (such as logging middleware) is
 * visible to the test body.
 */
export function beforeEach(body: () => Operation<void>): void {
  expectSuite("beforeEach").addSetup(body);
}
