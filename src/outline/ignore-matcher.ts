import { Minimatch } from "minimatch";

export type IgnoreMatcher = (relativePath: string) => boolean;

interface CompiledPattern {
  glob: string;
  directoryOnly: boolean;
  matcher: Minimatch;
}

const TRAILING_SEPARATOR = /[/\\]+$/;

/**
 * Turn one ignore pattern into a minimatch glob.
 *
 * A trailing separator means "everything beneath this directory" and becomes
 * a `/**` suffix. A pattern without any other separator may match at any
 * depth, the way a bare `__pycache__` or `*.pyc` is meant.
 */
export function toGlob(pattern: string): { glob: string; directoryOnly: boolean } {
  const directoryOnly = TRAILING_SEPARATOR.test(pattern);
  let body = pattern.replace(TRAILING_SEPARATOR, "");
  if (body.startsWith("./")) body = body.slice(2);

  const anchored = body.includes("/");
  let glob = anchored ? body.replace(/^\/+/, "") : `**/${body}`;
  if (directoryOnly) glob += "/**";
  return { glob, directoryOnly };
}

function compile(patterns: string[]): CompiledPattern[] {
  return patterns
    .map((p) => p.trim())
    .filter((p) => p.replace(TRAILING_SEPARATOR, "").length > 0)
    .map((p) => {
      const { glob, directoryOnly } = toGlob(p);
      return {
        glob,
        directoryOnly,
        matcher: new Minimatch(glob, { dot: true, nonegate: true, nocomment: true }),
      };
    });
}

/**
 * Every prefix of a relative path, shortest first: `a/b/c.py` gives
 * `a`, `a/b`, `a/b/c.py`.
 */
export function pathPrefixes(relativePath: string): string[] {
  const segments = relativePath
    .split(/[/\\]+/)
    .filter((s) => s.length > 0 && s !== ".");
  return segments.map((_, i) => segments.slice(0, i + 1).join("/"));
}

export function createIgnoreMatcher(patterns: string[]): IgnoreMatcher {
  const compiled = compile(patterns);
  if (compiled.length === 0) return () => false;

  return (relativePath) => {
    for (const prefix of pathPrefixes(relativePath)) {
      if (compiled.some((p) => p.matcher.match(prefix))) return true;
    }
    return false;
  };
}

export function matchesIgnore(relativePath: string, patterns: string[]): boolean {
  return createIgnoreMatcher(patterns)(relativePath);
}

/**
 * Globs of the directory patterns, for pruning a directory scan before the
 * matcher sees individual files.
 */
export function directoryGlobs(patterns: string[]): string[] {
  return compile(patterns)
    .filter((p) => p.directoryOnly)
    .map((p) => p.glob);
}
