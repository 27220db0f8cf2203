import { minimatch } from "minimatch";

const OPTIONS = { dot: true, nocomment: true, nonegate: true } as const;

/**
 * `*` stops at `/`, `**` crosses it, `?` is one character, `[abc]` and
 * `[!abc]` are character classes.
 */
export function matchGlob(path: string, pattern: string): boolean {
  return minimatch(path, pattern, OPTIONS);
}

export function matchAny(path: string, patterns: readonly string[]): boolean {
  return patterns.some((p) => matchGlob(path, p));
}
