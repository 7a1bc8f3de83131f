import { createApi } from "@effectionx/context-api";
import type { Operation } from "effection";
import type {
  CaseOutcome,
  ComparisonOutcome,
  SolverResult,
  SuiteSummary,
} from "../types.ts";
import { isUnrecognized } from "./compare.ts";

export function formatResult(result: SolverResult): string {
  switch (result.kind) {
    case "text":
      return result.found ? JSON.stringify(result.verdict) : `"" (no verdict)`;
    case "status": {
      let status = result.code !== null
        ? `exit ${result.code}`
        : `signal ${result.signal}`;
      return `${status} (${result.winner})`;
    }
    case "timeout":
      return `timed out after ${result.timeout}ms`;
  }
}

function label(algorithm?: string): string {
  return algorithm !== undefined ? `[${algorithm}] ` : "";
}

function describeComparison(comparison: ComparisonOutcome): string {
  let { reference, candidate, algorithm } = comparison;
  return `${label(algorithm)}reference: ${formatResult(reference)}  candidate: ${
    formatResult(candidate)
  }`;
}

/**
 * The single report line of a test case. Passing cases are one word and an
 * id; anything else carries both raw results so the discrepancy can be
 * told apart from an extraction problem without re-running.
 */
export function formatCase(outcome: CaseOutcome): string {
  let details: string[] = [];

  for (let comparison of outcome.comparisons) {
    if (
      !comparison.matched ||
      isUnrecognized(comparison.reference) ||
      isUnrecognized(comparison.candidate)
    ) {
      details.push(describeComparison(comparison));
    }
  }

  for (let verification of outcome.verifications) {
    if (!verification.verified) {
      details.push(
        `${label(verification.algorithm)}verification failed (${verification.reason})`,
      );
    }
  }

  let status = (outcome.passed ? "ok" : "FAIL").padEnd(6);
  let line = `${status}${outcome.testCase.id}`;
  return details.length > 0 ? `${line}  ${details.join("; ")}` : line;
}

export function formatSummary(summary: SuiteSummary): string {
  let cases = summary.total === 1 ? "case" : "cases";
  return `${summary.total} ${cases}, ${summary.failed} failed`;
}

/**
 * Where report lines go. Installing middleware with `reportApi.around()`
 * redirects or records them.
 */
export const reportApi = createApi("report", {
  *testCase(outcome: CaseOutcome): Operation<void> {
    console.log(formatCase(outcome));
  },
  *summary(summary: SuiteSummary): Operation<void> {
    console.log(formatSummary(summary));
  },
});

export const report = reportApi.operations;
