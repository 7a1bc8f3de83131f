import picomatch from "picomatch";

const GLOB_CHARS = /[*?[{]/;

export function isGlob(pattern: string): boolean {
  return GLOB_CHARS.test(pattern);
}

/**
 * Split a glob into the directory to start walking from, and the pattern
 * that paths relative to that directory must match.
 *
 * @example
 * ```ts
 * splitGlob("inputs/tests/*.gm"); // { base: "inputs/tests", pattern: "*.gm" }
 * ```
 */
export function splitGlob(glob: string): { base: string; pattern: string } {
  let segments = glob.split("/");
  let index = segments.findIndex((segment) => isGlob(segment));
  if (index < 0) {
    index = segments.length;
  }
  let base = segments.slice(0, index).join("/");
  if (base === "") {
    base = glob.startsWith("/") ? "/" : ".";
  }
  return { base, pattern: segments.slice(index).join("/") };
}

/**
 * A predicate over `/`-separated paths relative to the glob's base. Supports
 * `*`, `?`, character classes (negated with `!` or `^`), `{a,b}`
 * alternation and `**` for any number of directories.
 */
export function globMatcher(pattern: string): (path: string) => boolean {
  return picomatch(pattern);
}
