import type { ComparisonOutcome, SolverResult } from "../types.ts";

function sameVerdict(reference: SolverResult, candidate: SolverResult): boolean {
  if (reference.kind === "text" && candidate.kind === "text") {
    return reference.raw.equals(candidate.raw);
  }
  if (reference.kind === "status" && candidate.kind === "status") {
    return reference.code === candidate.code &&
      reference.signal === candidate.signal;
  }
  // a timeout, or results produced by different protocols
  return false;
}

/**
 * Text verdicts match when they are identical bytes, exit-status verdicts
 * when the statuses are identical. Nothing else matches.
 */
export function compare(
  reference: SolverResult,
  candidate: SolverResult,
  algorithm?: string,
): ComparisonOutcome {
  let outcome: ComparisonOutcome = {
    matched: sameVerdict(reference, candidate),
    reference,
    candidate,
  };
  if (algorithm !== undefined) {
    outcome.algorithm = algorithm;
  }
  return outcome;
}

/**
 * An exit status that the winner table has no player for.
 */
export function isUnrecognized(result: SolverResult): boolean {
  return result.kind === "status" && result.winner === "unrecognized";
}
