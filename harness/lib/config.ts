import * as fsp from "node:fs/promises";
import * as path from "node:path";
import process from "node:process";
import { type Operation, until } from "effection";
import type { ZodIssue } from "zod";
import { log } from "../logger.ts";
import { type HarnessConfig, HarnessConfigSchema } from "../types.ts";
import { ConfigError } from "./errors.ts";

export const DEFAULT_CONFIG_FILE = "solver-diff.config.json";

/**
 * Command-line settings. Every one that is present wins over the
 * configuration file.
 */
export interface ConfigOverrides {
  inputs?: string;
  mode?: HarnessConfig["mode"];
  marker?: string;
  reference?: string;
  candidate?: string;
  algorithms?: string[];
  concurrency?: number;
  timeout?: number;
}

export interface LoadConfigOptions {
  /**
   * Explicit configuration file. It is an error for it to be missing.
   */
  configPath?: string;
  /**
   * Where to look for `solver-diff.config.json` when no file is given
   */
  cwd?: string;
  overrides?: ConfigOverrides;
}

function issuesOf(issues: ZodIssue[]) {
  return issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function* readConfigFile(
  file: string,
  required: boolean,
): Operation<Record<string, unknown> | undefined> {
  let text: string;
  try {
    text = yield* until(fsp.readFile(file, "utf-8"));
  } catch (error) {
    if (!required && isMissing(error)) {
      return undefined;
    }
    throw new ConfigError(file, [{
      path: "",
      message: error instanceof Error ? error.message : String(error),
    }]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(file, [{
      path: "",
      message: error instanceof Error ? error.message : String(error),
    }]);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(file, [{ path: "", message: "expected an object" }]);
  }
  yield* log.debug(`loaded configuration from ${file}`);
  return { ...parsed };
}

function solverOverride(base: unknown, command?: string): unknown {
  if (command === undefined) {
    return base;
  }
  let solver = typeof base === "object" && base !== null ? base : {};
  return { ...solver, command };
}

/**
 * Merge `overrides` into `file` and validate the result. Absent settings
 * take their defaults from `HarnessConfigSchema`.
 */
export function resolveConfig(
  file: Record<string, unknown>,
  overrides: ConfigOverrides = {},
  source = "command line",
): HarnessConfig {
  let { reference, candidate, ...rest } = overrides;
  let merged: Record<string, unknown> = { ...file };
  for (let [key, value] of Object.entries(rest)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  merged.reference = solverOverride(file.reference, reference);
  merged.candidate = solverOverride(file.candidate, candidate);

  let result = HarnessConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(source, issuesOf(result.error.issues));
  }
  return result.data;
}

export function* loadConfig(
  options: LoadConfigOptions = {},
): Operation<HarnessConfig> {
  let { configPath, cwd = process.cwd(), overrides } = options;
  let file = configPath ?? path.join(cwd, DEFAULT_CONFIG_FILE);
  let contents = yield* readConfigFile(file, configPath !== undefined);
  if (!contents) {
    return resolveConfig({}, overrides);
  }
  return resolveConfig(contents, overrides, file);
}
