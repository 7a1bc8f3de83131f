import { z } from "zod";
import { parser } from "zod-opts";
import { ModeSchema } from "../types.ts";
import type { ConfigOverrides } from "./config.ts";

export interface Flags {
  configPath?: string;
  verbose: boolean;
  overrides: ConfigOverrides;
}

/**
 * Parse the command line. `--help`, `--version` and usage errors are
 * answered by zod-opts, which exits the process.
 */
export function parseArgs(argv: string[], version: string): Flags {
  let parsed = parser()
    .name("solver-diff")
    .version(version)
    .description(
      "run a candidate parity game solver and a reference solver over the same games and compare their verdicts",
    )
    .options({
      mode: {
        type: ModeSchema.optional(),
        alias: "m",
        description: "compare text verdicts or exit statuses",
      },
      config: {
        type: z.string().optional(),
        alias: "c",
        description: "JSON configuration file (default: ./solver-diff.config.json)",
      },
      reference: {
        type: z.string().optional(),
        description: "command that runs the reference solver",
      },
      candidate: {
        type: z.string().optional(),
        description: "command that runs the candidate solver",
      },
      marker: {
        type: z.string().optional(),
        description: "winner announcement that starts a text verdict",
      },
      algorithm: {
        type: z.string().optional(),
        alias: "a",
        description: "comma separated candidate algorithms to run",
      },
      concurrency: {
        type: z.number().int().positive().optional(),
        alias: "j",
        description: "number of games compared at the same time",
      },
      timeout: {
        type: z.number().int().positive().optional(),
        alias: "t",
        description: "milliseconds a single solver run may take",
      },
      verbose: {
        type: z.boolean().default(false),
        alias: "v",
        description: "print debugging output",
      },
    })
    .args([
      {
        name: "inputs",
        type: z.string().optional(),
        description: "directory, file or glob of game descriptions",
      },
    ])
    .parse(argv);

  let algorithms = parsed.algorithm
    ?.split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);

  return {
    configPath: parsed.config,
    verbose: parsed.verbose,
    overrides: {
      inputs: parsed.inputs,
      mode: parsed.mode,
      marker: parsed.marker,
      reference: parsed.reference,
      candidate: parsed.candidate,
      algorithms,
      concurrency: parsed.concurrency,
      timeout: parsed.timeout,
    },
  };
}
