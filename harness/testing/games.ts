import * as fsp from "node:fs/promises";
import * as path from "node:path";
import { type Operation, until } from "effection";
import { type TempDir, useTempDir } from "../lib/temp-dir.ts";

/**
 * A temporary input set holding `files`, keyed by `/`-separated path.
 */
export function* useGames(
  files: Record<string, string>,
): Operation<TempDir> {
  const dir = yield* useTempDir("solver-diff-games-");
  for (const [name, content] of Object.entries(files)) {
    const file = dir.join(...name.split("/"));
    yield* until(fsp.mkdir(path.dirname(file), { recursive: true }));
    yield* until(fsp.writeFile(file, content));
  }
  return dir;
}
