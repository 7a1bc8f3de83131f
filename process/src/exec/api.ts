import type { Operation } from "effection";

export interface ExecOptions {
  /**
   * Arguments appended to the ones split out of the command string. These
   * are passed through verbatim, so paths with spaces need no quoting.
   */
  arguments?: string[];

  cwd?: string;

  /**
   * Milliseconds to wait for the process to exit before its process group
   * is terminated and `join()` fails with an `ExecTimeoutError`.
   */
  timeout?: number;
}

export interface ExitStatus {
  command: string;
  options: ExecOptions;

  /**
   * `null` when the process was terminated by a signal
   */
  code: number | null;

  signal: string | null;
}

export interface ProcessResult extends ExitStatus {
  /**
   * stdout decoded as UTF-8
   */
  stdout: string;
  stderr: string;

  /**
   * exactly the bytes written to stdout and stderr
   */
  bytes: { stdout: Buffer; stderr: Buffer };
}

export interface Process {
  /**
   * Wait for the process to exit and return its status together with
   * everything it wrote to stdout and stderr.
   */
  join(): Operation<ProcessResult>;

  /**
   * Like `join()`, but fails with an `ExecError` on a non-zero exit.
   */
  expect(): Operation<ProcessResult>;
}

export type CreateOSProcess = (
  command: string,
  options: ExecOptions,
) => Operation<Process>;
