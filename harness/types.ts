import { z } from "zod";

export const ModeSchema = z.enum(["text", "status"]);

export const PlayerSchema = z.enum(["even", "odd"]);

export const SolverArgsSchema = z.object({
  text: z.array(z.string()),
  status: z.array(z.string()),
});

function solverSchema(command: string, args: z.input<typeof SolverArgsSchema>) {
  return z.object({
    command: z.string().trim().min(1).default(command),
    args: z.object({
      text: z.array(z.string()).default(args.text),
      status: z.array(z.string()).default(args.status),
    }).default({}),
  }).default({});
}

export const VerifyConfigSchema = z.object({
  /**
   * arguments making the candidate print its solution on stdout
   */
  candidate: z.array(z.string()).default(["parity", "-s"]),
  /**
   * arguments making the reference check `{solution}` against the game
   */
  reference: z.array(z.string()).default(["-v", "{input}", "--sol", "{solution}"]),
});

export const HarnessConfigSchema = z.object({
  inputs: z.string().min(1).default("./inputs/tests"),
  mode: ModeSchema.default("text"),
  marker: z.string().min(1).default("won by"),
  concurrency: z.number().int().positive().default(1),
  timeout: z.number().int().positive().optional(),
  algorithms: z.array(z.string().min(1)).default([]),
  winners: z.record(z.string().regex(/^-?\d+$/), PlayerSchema).default({
    "0": "even",
    "1": "odd",
  }),
  reference: solverSchema("../oink/build/oink", {
    text: ["-p", "--no"],
    status: ["-v"],
  }),
  candidate: solverSchema("./target/release/lmc", {
    text: ["parity", "-r"],
    status: ["parity", "-v"],
  }),
  verify: VerifyConfigSchema.optional(),
});

export type Mode = z.infer<typeof ModeSchema>;
export type Player = z.infer<typeof PlayerSchema>;
export type SolverConfig = z.infer<typeof HarnessConfigSchema>["reference"];
export type VerifyConfig = z.infer<typeof VerifyConfigSchema>;
export type HarnessConfig = z.infer<typeof HarnessConfigSchema>;
export type HarnessConfigInput = z.input<typeof HarnessConfigSchema>;

export type SolverIdentity = "reference" | "candidate";

export interface TestCase {
  /**
   * Path relative to the input-set base, with `/` separators. This is what
   * reports show.
   */
  id: string;
  /**
   * Path handed to the solvers
   */
  path: string;
}

/**
 * Everything that determines one external call.
 */
export interface SolverInvocation {
  solver: SolverIdentity;
  testCase: TestCase;
  command: string;
  arguments: string[];
}

/**
 * Verdict extracted from a solver's stdout. `raw` is empty when the marker
 * never appeared, which compares like any other verdict.
 */
export interface TextVerdict {
  kind: "text";
  /**
   * `raw` for display
   */
  verdict: string;
  /**
   * the bytes that are compared
   */
  raw: Buffer;
  found: boolean;
  code: number | null;
}

/**
 * Verdict encoded in a solver's exit status. `winner` is "unrecognized"
 * when the status is missing from the winner table or the process was
 * killed by a signal.
 */
export interface StatusVerdict {
  kind: "status";
  code: number | null;
  signal: string | null;
  winner: Player | "unrecognized";
}

export interface TimedOut {
  kind: "timeout";
  timeout: number;
}

export type SolverResult = TextVerdict | StatusVerdict | TimedOut;

export interface ComparisonOutcome {
  matched: boolean;
  reference: SolverResult;
  candidate: SolverResult;
  algorithm?: string;
}

export interface VerificationOutcome {
  verified: boolean;
  algorithm?: string;
  /**
   * why the solution was rejected, absent when `verified`
   */
  reason?: string;
}

export interface CaseOutcome {
  testCase: TestCase;
  comparisons: ComparisonOutcome[];
  verifications: VerificationOutcome[];
  passed: boolean;
}

export type SuiteState = "running" | "all-matched" | "has-mismatch";

export interface SuiteSummary {
  total: number;
  failed: number;
  state: SuiteState;
}
