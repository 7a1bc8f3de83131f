#!/usr/bin/env -S node --import tsx
import { exit, main } from "effection";
import packageJson from "./package.json" with { type: "json" };
import { log, verboseLogging } from "./logger.ts";
import { loadConfig } from "./lib/config.ts";
import { ConfigError, EnumerationError, InvocationError } from "./lib/errors.ts";
import { parseArgs } from "./lib/parse-args.ts";
import { exitCode, runSuite } from "./lib/suite.ts";

await main(function* (argv) {
  let flags = parseArgs(argv, packageJson.version);

  yield* verboseLogging(flags.verbose);

  try {
    let config = yield* loadConfig({
      configPath: flags.configPath,
      overrides: flags.overrides,
    });
    let summary = yield* runSuite(config);
    let status = exitCode(summary);
    if (status !== 0) {
      yield* exit(status);
    }
  } catch (error) {
    if (
      error instanceof ConfigError ||
      error instanceof EnumerationError ||
      error instanceof InvocationError
    ) {
      yield* log.error(error.message);
      yield* exit(1);
    }
    throw error;
  }
});
