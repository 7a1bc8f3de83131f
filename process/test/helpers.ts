import * as fsp from "node:fs/promises";
import process from "node:process";
import { type Operation, sleep, until } from "effection";

export function* captureError(op: Operation<unknown>): Operation<Error> {
  try {
    yield* op;
  } catch (error) {
    return error instanceof Error ? error : new Error(String(error));
  }
  throw new Error("expected operation to throw an error, but it did not!");
}

function* isRunning(pid: number): Operation<boolean> {
  try {
    process.kill(pid, 0);
  } catch {
    return false;
  }
  // a killed process nobody has reaped yet still answers signal 0
  try {
    let stat = yield* until(fsp.readFile(`/proc/${pid}/stat`, "utf-8"));
    let state = stat.charAt(stat.lastIndexOf(")") + 2);
    return state !== "Z";
  } catch {
    return false;
  }
}

/**
 * Wait up to `timeout` milliseconds for process `pid` to be gone.
 */
export function* waitForExit(pid: number, timeout = 2000): Operation<boolean> {
  for (let waited = 0; waited < timeout; waited += 20) {
    if (!(yield* isRunning(pid))) {
      return true;
    }
    yield* sleep(20);
  }
  return false;
}
