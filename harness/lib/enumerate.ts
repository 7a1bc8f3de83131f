import type { Stats } from "node:fs";
import * as fsp from "node:fs/promises";
import * as path from "node:path";
import { type Operation, type Stream, until } from "effection";
import type { TestCase } from "../types.ts";
import { EnumerationError } from "./errors.ts";
import { globMatcher, isGlob, splitGlob } from "./glob.ts";

interface Root {
  base: string;
  match?: (path: string) => boolean;
  file?: boolean;
}

interface Entry {
  /** path below the base, `/`-separated */
  relative: string;
  isDirectory: boolean;
}

function failure(location: string, error: unknown): EnumerationError {
  return new EnumerationError(
    location,
    error instanceof Error ? error : new Error(String(error)),
  );
}

function* resolveRoot(location: string): Operation<Root> {
  let base = location;
  let match: ((path: string) => boolean) | undefined;
  if (isGlob(location)) {
    let glob = splitGlob(location);
    base = glob.base;
    match = globMatcher(glob.pattern);
  }

  try {
    let stat = yield* until(fsp.stat(base));
    if (stat.isDirectory()) {
      return { base, match };
    }
    if (stat.isFile() && !match) {
      return { base, file: true };
    }
    throw new Error("not a directory");
  } catch (error) {
    throw failure(location, error);
  }
}

/**
 * What a symbolic link points to, or `undefined` when it points nowhere.
 */
function* linkTarget(link: string): Operation<Stats | undefined> {
  try {
    return yield* until(fsp.stat(link));
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    throw error;
  }
}

function* list(
  location: string,
  base: string,
  relative: string,
): Operation<Entry[]> {
  let dir = relative ? path.join(base, relative) : base;
  try {
    let dirents = yield* until(fsp.readdir(dir, { withFileTypes: true }));
    let entries: Entry[] = [];
    for (let dirent of dirents) {
      if (dirent.name.startsWith(".")) {
        continue;
      }
      let isDirectory = dirent.isDirectory();
      if (dirent.isSymbolicLink()) {
        let target = yield* linkTarget(path.join(dir, dirent.name));
        if (!target) {
          continue;
        }
        isDirectory = target.isDirectory();
      }
      entries.push({
        relative: relative ? `${relative}/${dirent.name}` : dirent.name,
        isDirectory,
      });
    }
    return entries.sort((a, b) =>
      a.relative < b.relative ? -1 : a.relative > b.relative ? 1 : 0
    );
  } catch (error) {
    throw failure(location, error);
  }
}

/**
 * Resolve `location` into the test cases it contains: every file below a
 * directory, the files matching a glob, or a single file.
 *
 * The stream is lazy and restartable. Nothing is read until it is
 * subscribed to, and every subscription walks the file system again from
 * the start. Entries are visited depth first with each directory sorted by
 * name, so the order is the same on every run. Hidden entries and symbolic
 * links that point nowhere are skipped.
 *
 * Subscribing fails with an `EnumerationError` when `location` (or the
 * directory a glob starts from) does not exist or cannot be read.
 *
 * @example
 * ```ts
 * for (let testCase of yield* each(enumerate("inputs/tests/*.gm"))) {
 *   console.log(testCase.id);
 *   yield* each.next();
 * }
 * ```
 */
export function enumerate(location: string): Stream<TestCase, void> {
  return {
    *[Symbol.iterator]() {
      let root = yield* resolveRoot(location);

      if (root.file) {
        let pending: TestCase[] = [{
          id: path.basename(root.base),
          path: root.base,
        }];
        return {
          *next() {
            let testCase = pending.shift();
            return testCase
              ? { done: false, value: testCase } as const
              : { done: true, value: undefined } as const;
          },
        };
      }

      let { base, match } = root;

      // reversed, so that popping yields entries in sorted order
      let stack = (yield* list(location, base, "")).reverse();

      return {
        *next() {
          let entry = stack.pop();
          while (entry) {
            if (entry.isDirectory) {
              let children = yield* list(location, base, entry.relative);
              stack.push(...children.reverse());
            } else if (!match || match(entry.relative)) {
              return {
                done: false,
                value: {
                  id: entry.relative,
                  path: path.join(base, entry.relative),
                },
              } as const;
            }
            entry = stack.pop();
          }
          return { done: true, value: undefined } as const;
        },
      };
    },
  };
}
