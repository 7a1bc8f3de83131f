import * as shellwords from "shellwords";

import { type Operation, race, scoped, sleep } from "effection";
import type {
  CreateOSProcess,
  ExecOptions,
  Process,
  ProcessResult,
} from "./exec/api.ts";
import { ExecTimeoutError } from "./exec/error.ts";
import { createPosixProcess } from "./exec/posix.ts";

export * from "./exec/api.ts";
export * from "./exec/error.ts";

export interface Exec {
  join(): Operation<ProcessResult>;
  expect(): Operation<ProcessResult>;
}

const createProcess: CreateOSProcess = createPosixProcess;

function* expire(
  command: string,
  options: ExecOptions,
  timeout: number,
): Operation<never> {
  yield* sleep(timeout);
  throw new ExecTimeoutError(command, options, timeout);
}

/**
 * Execute `command` with `options`. The command string is split into words
 * the way a posix shell would, and `options.arguments` are appended to them.
 *
 * `join()` and `expect()` run the process in a scope of their own, so its
 * process group is torn down as soon as they return, throw or are halted.
 *
 * @example
 * ```ts
 * let { code, stdout } = yield* exec("solver parity -r", {
 *   arguments: ["games/a.gm"],
 * }).join();
 * ```
 */
export function exec(command: string, options: ExecOptions = {}): Exec {
  let [cmd, ...args] = shellwords.split(command);
  let opts = { ...options, arguments: args.concat(options.arguments ?? []) };

  function run(
    wait: (process: Process) => Operation<ProcessResult>,
  ): Operation<ProcessResult> {
    return scoped(function* () {
      let process = yield* createProcess(cmd, opts);
      let { timeout } = opts;
      if (timeout === undefined) {
        return yield* wait(process);
      }
      return yield* race([wait(process), expire(cmd, opts, timeout)]);
    });
  }

  return {
    join() {
      return run((process) => process.join());
    },
    expect() {
      return run((process) => process.expect());
    },
  };
}
