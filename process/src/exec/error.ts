import type { ExecOptions, ExitStatus } from "./api.ts";

function commandLine(command: string, options: ExecOptions): string {
  return `$ ${command} ${options.arguments?.join(" ") ?? ""}`.trim();
}

export class ExecError extends Error {
  status: ExitStatus;
  command: string;
  options: ExecOptions;

  constructor(status: ExitStatus, command: string, options: ExecOptions) {
    super();
    this.status = status;
    this.command = command;
    this.options = options;
  }

  override name = "ExecError";

  override get message(): string {
    let code = this.status.code !== null ? `code: ${this.status.code}` : null;

    let signal = this.status.signal ? `signal: ${this.status.signal}` : null;

    let cwd = this.options.cwd ? `cwd: ${this.options.cwd}` : null;

    return [code, signal, cwd, commandLine(this.command, this.options)]
      .filter((item) => !!item)
      .join("\n");
  }
}

export class ExecTimeoutError extends Error {
  command: string;
  options: ExecOptions;
  timeout: number;

  constructor(command: string, options: ExecOptions, timeout: number) {
    super();
    this.command = command;
    this.options = options;
    this.timeout = timeout;
  }

  override name = "ExecTimeoutError";

  override get message(): string {
    return `process did not exit within ${this.timeout}ms\n${
      commandLine(this.command, this.options)
    }`;
  }
}
