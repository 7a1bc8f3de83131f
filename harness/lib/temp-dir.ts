import * as fsp from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { type Operation, resource, until } from "effection";

export interface TempDir {
  path: string;
  join(...segments: string[]): string;
}

/**
 * A fresh directory under the system temp directory that is removed, with
 * everything in it, when the current scope exits.
 */
export function useTempDir(prefix = "solver-diff-"): Operation<TempDir> {
  return resource(function* (provide) {
    let dir = yield* until(fsp.mkdtemp(path.join(os.tmpdir(), prefix)));
    try {
      yield* provide({
        path: dir,
        join: (...segments) => path.join(dir, ...segments),
      });
    } finally {
      yield* until(fsp.rm(dir, { recursive: true, force: true }));
    }
  });
}
