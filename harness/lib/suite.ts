import {
  all,
  createQueue,
  each,
  type Operation,
  scoped,
  spawn,
  type Task,
} from "effection";
import { log } from "../logger.ts";
import type {
  CaseOutcome,
  HarnessConfig,
  SuiteState,
  SuiteSummary,
  TestCase,
  VerificationOutcome,
} from "../types.ts";
import { compare } from "./compare.ts";
import { enumerate } from "./enumerate.ts";
import { createInvoker, type Invoker } from "./invoke.ts";
import { createWorkerPool } from "./pool.ts";
import { preflight } from "./preflight.ts";
import { report } from "./report.ts";
import { type TempDir, useTempDir } from "./temp-dir.ts";
import { verifySolution } from "./verify.ts";

export function stateOf(summary: Pick<SuiteSummary, "failed">): SuiteState {
  return summary.failed === 0 ? "all-matched" : "has-mismatch";
}

/**
 * 0 when every case passed, 1 otherwise
 */
export function exitCode(summary: SuiteSummary): number {
  return summary.state === "all-matched" ? 0 : 1;
}

export function tally(
  summary: SuiteSummary,
  outcome: CaseOutcome,
): SuiteSummary {
  return {
    total: summary.total + 1,
    failed: summary.failed + (outcome.passed ? 0 : 1),
    state: "running",
  };
}

export interface RunCaseOptions {
  config: HarnessConfig;
  invoker: Invoker;
  solutions?: TempDir;
}

/**
 * Obtain the reference verdict once and a candidate verdict per algorithm,
 * all concurrently, compare them, and verify candidate solutions when
 * configured.
 */
export function* runCase(
  testCase: TestCase,
  options: RunCaseOptions,
): Operation<CaseOutcome> {
  let { config, invoker, solutions } = options;
  let { mode } = config;
  let algorithms: Array<string | undefined> = config.algorithms.length > 0
    ? config.algorithms
    : [undefined];

  let [reference, ...candidates] = yield* all([
    invoker.invoke("reference", testCase, mode),
    ...algorithms.map((algorithm) =>
      invoker.invoke("candidate", testCase, mode, algorithm)
    ),
  ]);

  let comparisons = candidates.map((candidate, index) =>
    compare(reference, candidate, algorithms[index])
  );

  let verifications: VerificationOutcome[] = [];
  if (config.verify && solutions) {
    for (let algorithm of algorithms) {
      verifications.push(
        yield* verifySolution(
          config,
          config.verify,
          testCase,
          solutions,
          algorithm,
        ),
      );
    }
  }

  let passed = comparisons.every((comparison) => comparison.matched) &&
    verifications.every((verification) => verification.verified);

  return { testCase, comparisons, verifications, passed };
}

/**
 * Compare the candidate against the reference on every case of
 * `config.inputs`.
 *
 * Cases run in a pool of `config.concurrency` workers, but their lines are
 * reported strictly in enumeration order. A mismatch never stops the run;
 * every case is reported before the summary. Failing to enumerate the
 * inputs or to start a solver ends the run with an `EnumerationError` or
 * `InvocationError`.
 */
export function runSuite(
  config: HarnessConfig,
  invoker: Invoker = createInvoker(config),
): Operation<SuiteSummary> {
  return scoped(function* () {
    yield* log.info(
      `comparing ${config.candidate.command} against ${config.reference.command} in ${config.mode} mode`,
    );

    yield* preflight(config);

    let solutions = config.verify ? yield* useTempDir() : undefined;
    let pool = createWorkerPool(config.concurrency);
    let pending = createQueue<Task<CaseOutcome>, void>();
    let summary: SuiteSummary = { total: 0, failed: 0, state: "running" };

    let reporter = yield* spawn(function* () {
      let next = yield* pending.next();
      while (!next.done) {
        let outcome = yield* next.value;
        summary = tally(summary, outcome);
        yield* report.testCase(outcome);
        next = yield* pending.next();
      }
    });

    for (let testCase of yield* each(enumerate(config.inputs))) {
      pending.add(
        yield* pool.spawn(() =>
          runCase(testCase, { config, invoker, solutions })
        ),
      );
      yield* each.next();
    }
    pending.close();

    yield* reporter;

    summary = { ...summary, state: stateOf(summary) };
    yield* report.summary(summary);
    return summary;
  });
}
