import { createApi } from "@effectionx/context-api";
import { exec, ExecTimeoutError } from "@solver-diff/process";
import type { Operation } from "effection";
import { log } from "../logger.ts";
import type {
  HarnessConfig,
  Mode,
  SolverIdentity,
  SolverInvocation,
  SolverResult,
  TestCase,
  TimedOut,
} from "../types.ts";
import { InvocationError } from "./errors.ts";
import { type Capture, strategyFor } from "./extract.ts";

export interface CaptureOptions {
  timeout?: number;
}

/**
 * The one place where solvers are actually started. Everything above it
 * works on captures, so tests swap this out with `captureApi.around()` to
 * replay recorded solver behaviour instead of spawning processes.
 */
export const captureApi = createApi("capture", {
  *capture(
    invocation: SolverInvocation,
    options: CaptureOptions,
  ): Operation<Capture> {
    let { code, signal, stderr, bytes } = yield* exec(invocation.command, {
      arguments: invocation.arguments,
      timeout: options.timeout,
    }).join();
    return { code, signal, stdout: bytes.stdout, stderr };
  },
});

export const { capture } = captureApi.operations;

export interface Placeholders {
  input: string;
  algorithm?: string;
  solution?: string;
}

/**
 * Substitute `{input}`, `{algorithm}` and `{solution}` in `args`.
 *
 * When an algorithm is given and no argument mentions `{algorithm}`,
 * `-a <algorithm>` is inserted after the first argument (the solver's
 * sub-command). When no argument mentions `{input}`, the input path is
 * appended as the last argument.
 */
export function fillArguments(
  args: string[],
  placeholders: Placeholders,
): string[] {
  let { input, algorithm, solution } = placeholders;
  let filled = [...args];

  if (
    algorithm !== undefined && !args.some((arg) => arg.includes("{algorithm}"))
  ) {
    filled.splice(Math.min(1, filled.length), 0, "-a", algorithm);
  }

  filled = filled.map((arg) => {
    let value = arg.replaceAll("{input}", input);
    if (algorithm !== undefined) {
      value = value.replaceAll("{algorithm}", algorithm);
    }
    if (solution !== undefined) {
      value = value.replaceAll("{solution}", solution);
    }
    return value;
  });

  if (!args.some((arg) => arg.includes("{input}"))) {
    filled.push(input);
  }

  return filled;
}

export function commandLine(invocation: SolverInvocation): string {
  return [invocation.command, ...invocation.arguments].join(" ");
}

export function resolveInvocation(
  config: Pick<HarnessConfig, "reference" | "candidate">,
  solver: SolverIdentity,
  testCase: TestCase,
  args: string[],
  placeholders: Omit<Placeholders, "input"> = {},
): SolverInvocation {
  return {
    solver,
    testCase,
    command: config[solver].command,
    arguments: fillArguments(args, { ...placeholders, input: testCase.path }),
  };
}

/**
 * Start `invocation` and wait for it. A solver that cannot be started at
 * all raises an `InvocationError`.
 */
export function* run(
  invocation: SolverInvocation,
  timeout?: number,
): Operation<Capture | TimedOut> {
  yield* log.debug(`$ ${commandLine(invocation)}`);
  try {
    return yield* capture(invocation, { timeout });
  } catch (error) {
    if (error instanceof ExecTimeoutError) {
      yield* log.warn(
        `${invocation.solver} solver timed out after ${error.timeout}ms on ${invocation.testCase.id}`,
      );
      return { kind: "timeout", timeout: error.timeout };
    }
    throw new InvocationError(
      invocation.solver,
      commandLine(invocation),
      error instanceof Error ? error : new Error(String(error)),
      invocation.testCase,
    );
  }
}

export interface Invoker {
  /**
   * Run one solver on one test case and extract its verdict with the
   * protocol of `mode`.
   */
  invoke(
    solver: SolverIdentity,
    testCase: TestCase,
    mode: Mode,
    algorithm?: string,
  ): Operation<SolverResult>;
}

export function createInvoker(config: HarnessConfig): Invoker {
  return {
    *invoke(solver, testCase, mode, algorithm) {
      let strategy = strategyFor({ ...config, mode });
      let invocation = resolveInvocation(
        config,
        solver,
        testCase,
        config[solver].args[mode],
        solver === "candidate" ? { algorithm } : {},
      );
      let captured = yield* run(invocation, config.timeout);
      return "kind" in captured ? captured : strategy.extract(captured);
    },
  };
}
