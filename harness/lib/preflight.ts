import { constants } from "node:fs";
import * as fsp from "node:fs/promises";
import * as shellwords from "shellwords";
import { type Operation, until } from "effection";
import { log } from "../logger.ts";
import type { HarnessConfig, SolverIdentity } from "../types.ts";
import { InvocationError } from "./errors.ts";

const solvers: SolverIdentity[] = ["reference", "candidate"];

/**
 * Make sure every solver named by a path is there and executable before the
 * first case runs. Bare command names are left to the `PATH` lookup at
 * spawn time.
 */
export function* preflight(
  config: Pick<HarnessConfig, SolverIdentity>,
): Operation<void> {
  for (let solver of solvers) {
    let { command } = config[solver];
    let [executable] = shellwords.split(command);
    if (executable === undefined || !executable.includes("/")) {
      continue;
    }
    try {
      yield* until(fsp.access(executable, constants.X_OK));
    } catch (error) {
      throw new InvocationError(
        solver,
        command,
        error instanceof Error ? error : new Error(String(error)),
      );
    }
    yield* log.debug(`${solver} solver: ${executable}`);
  }
}
