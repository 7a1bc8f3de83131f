import type { Operation } from "effection";
import type { Capture } from "../lib/extract.ts";
import { captureApi } from "../lib/invoke.ts";
import { HarnessConfigSchema } from "../types.ts";
import type { HarnessConfig, HarnessConfigInput, SolverInvocation } from "../types.ts";

/**
 * Replace every solver started in the current scope with `respond`. The
 * invocations are recorded, in the order they were made, in the returned
 * array.
 */
export function* useFakeSolvers(
  respond: (invocation: SolverInvocation) => Operation<Capture>,
): Operation<SolverInvocation[]> {
  const calls: SolverInvocation[] = [];

  yield* captureApi.around({
    *capture([invocation]) {
      calls.push(invocation);
      return yield* respond(invocation);
    },
  });

  return calls;
}

export function printed(stdout: string | Buffer, code = 0): Capture {
  return {
    code,
    signal: null,
    stdout: typeof stdout === "string" ? Buffer.from(stdout) : stdout,
    stderr: "",
  };
}

export function exited(code: number | null, signal: string | null = null): Capture {
  return { code, signal, stdout: Buffer.alloc(0), stderr: "" };
}

/**
 * A configuration whose solvers are bare command names, so nothing is
 * checked on disk before the run.
 */
export function testConfig(input: HarnessConfigInput): HarnessConfig {
  return HarnessConfigSchema.parse({
    ...input,
    reference: { command: "reference", ...input.reference },
    candidate: { command: "candidate", ...input.candidate },
  });
}
