import type { SolverIdentity, TestCase } from "../types.ts";

/**
 * The input-set location could not be read. Nothing has been compared when
 * this is raised.
 */
export class EnumerationError extends Error {
  location: string;
  override cause: Error;

  constructor(location: string, cause: Error) {
    super();
    this.location = location;
    this.cause = cause;
  }

  override name = "EnumerationError";

  override get message(): string {
    return `cannot enumerate test cases at '${this.location}': ${this.cause.message}`;
  }
}

/**
 * A solver executable could not be started at all. Neither solver can be
 * trusted after this, so it ends the suite.
 */
export class InvocationError extends Error {
  solver: SolverIdentity;
  commandLine: string;
  testCase?: TestCase;
  override cause: Error;

  constructor(
    solver: SolverIdentity,
    commandLine: string,
    cause: Error,
    testCase?: TestCase,
  ) {
    super();
    this.solver = solver;
    this.commandLine = commandLine;
    this.cause = cause;
    this.testCase = testCase;
  }

  override name = "InvocationError";

  override get message(): string {
    let during = this.testCase ? ` while running ${this.testCase.id}` : "";
    return `could not start the ${this.solver} solver${during}: ${this.cause.message}\n$ ${this.commandLine}`;
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigError extends Error {
  source: string;
  issues: ConfigIssue[];

  constructor(source: string, issues: ConfigIssue[]) {
    super();
    this.source = source;
    this.issues = issues;
  }

  override name = "ConfigError";

  override get message(): string {
    let details = this.issues.map((issue) =>
      issue.path ? `  - ${issue.path}: ${issue.message}` : `  - ${issue.message}`
    );
    return [`invalid configuration in ${this.source}`, ...details].join("\n");
  }
}
