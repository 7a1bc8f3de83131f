import { spawn as spawnProcess } from "node:child_process";
import process from "node:process";
import { Err, Ok, type Result, spawn, withResolvers } from "effection";
import { once } from "../eventemitter.ts";
import { useCaptured } from "../helpers.ts";
import type { CreateOSProcess, ProcessResult } from "./api.ts";
import { ExecError } from "./error.ts";

type CloseValue = [number | null, NodeJS.Signals | null];

export const createPosixProcess: CreateOSProcess = function* createPosixProcess(
  command,
  options,
) {
  let processResult = withResolvers<Result<CloseValue>>();

  // A process started by the command is not killed along with it, so the
  // child becomes the leader of its own process group (`detached`), and
  // the group as a whole is signalled through `-pid` on teardown.
  let childProcess = spawnProcess(command, options.arguments ?? [], {
    detached: true,
    cwd: options.cwd,
    stdio: ["ignore", "pipe", "pipe"],
  });

  let { pid } = childProcess;

  let stdout = yield* useCaptured(childProcess.stdout);
  let stderr = yield* useCaptured(childProcess.stderr);

  yield* spawn(function* trapError() {
    let [error] = yield* once<[Error]>(childProcess, "error");
    processResult.resolve(Err(error));
  });

  yield* spawn(function* () {
    try {
      // "close" fires only once both output streams have ended
      let value = yield* once<CloseValue>(childProcess, "close");
      processResult.resolve(Ok(value));
    } finally {
      if (pid !== undefined) {
        try {
          process.kill(-pid, "SIGTERM");
        } catch (error) {
          // ESRCH: the whole group has already exited
          if ((error as NodeJS.ErrnoException).code !== "ESRCH") {
            throw error;
          }
        }
      }
    }
  });

  function* join() {
    let result = yield* processResult.operation;
    if (!result.ok) {
      throw result.error;
    }
    let [code, signal] = result.value;
    return {
      command,
      options,
      code,
      signal,
      stdout: stdout.text,
      stderr: stderr.text,
      bytes: { stdout: stdout.bytes, stderr: stderr.bytes },
    } satisfies ProcessResult;
  }

  function* expect() {
    let result = yield* join();
    if (result.code !== 0) {
      throw new ExecError(result, command, options);
    }
    return result;
  }

  // starts the process and returns without waiting for it
  return { join, expect };
};
