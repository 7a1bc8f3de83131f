import * as fsp from "node:fs/promises";
import { type Operation, until } from "effection";
import type {
  HarnessConfig,
  TestCase,
  VerificationOutcome,
  VerifyConfig,
} from "../types.ts";
import { resolveInvocation, run } from "./invoke.ts";
import type { TempDir } from "./temp-dir.ts";

// `+` is always percent-encoded, so it can only appear as the separator
function solutionFile(testCase: TestCase, algorithm?: string): string {
  let name = encodeURIComponent(testCase.id);
  return algorithm !== undefined
    ? `${name}+${encodeURIComponent(algorithm)}.sol`
    : `${name}.sol`;
}

/**
 * Have the candidate print its solution of `testCase`, store it in `dir`
 * and ask the reference to check it. The solution is accepted when the
 * reference exits with status 0.
 */
export function* verifySolution(
  config: HarnessConfig,
  verify: VerifyConfig,
  testCase: TestCase,
  dir: TempDir,
  algorithm?: string,
): Operation<VerificationOutcome> {
  let rejected = (reason: string): VerificationOutcome =>
    algorithm !== undefined
      ? { verified: false, algorithm, reason }
      : { verified: false, reason };

  let solved = yield* run(
    resolveInvocation(config, "candidate", testCase, verify.candidate, {
      algorithm,
    }),
    config.timeout,
  );
  if ("kind" in solved) {
    return rejected(`candidate timed out after ${solved.timeout}ms`);
  }

  let solution = dir.join(solutionFile(testCase, algorithm));
  yield* until(fsp.writeFile(solution, solved.stdout));

  let checked = yield* run(
    resolveInvocation(config, "reference", testCase, verify.reference, {
      solution,
    }),
    config.timeout,
  );
  if ("kind" in checked) {
    return rejected(`reference timed out after ${checked.timeout}ms`);
  }
  if (checked.code !== 0) {
    let status = checked.code !== null
      ? `status ${checked.code}`
      : `signal ${checked.signal}`;
    return rejected(`reference rejected the solution with ${status}`);
  }

  return algorithm !== undefined
    ? { verified: true, algorithm }
    : { verified: true };
}
