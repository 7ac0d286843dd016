import * as fs from "node:fs";
import * as path from "node:path";
import fg from "fast-glob";
import ignore from "ignore";
import { getSupportedExtensions } from "../parser/languages.js";
import { createIgnoreMatcher, directoryGlobs } from "./ignore-matcher.js";
import { compareCodeUnits } from "../utils/compare.js";
import { logger } from "../utils/logger.js";

export interface DiscoveredFile {
  absolutePath: string;
  /** Relative to the outline root, always with `/` separators. */
  relativePath: string;
}

export interface DiscoveryOptions {
  ignorePatterns: string[];
  /** Also honor `<root>/.gitignore`. */
  gitignore?: boolean;
}

function loadGitignore(root: string): ((relativePath: string) => boolean) | null {
  const gitignorePath = path.join(root, ".gitignore");
  if (!fs.existsSync(gitignorePath)) return null;

  const ig = ignore().add(fs.readFileSync(gitignorePath, "utf-8"));
  return (relativePath) => ig.ignores(relativePath);
}

export async function discoverFiles(
  root: string,
  options: DiscoveryOptions,
): Promise<DiscoveredFile[]> {
  const isIgnored = createIgnoreMatcher(options.ignorePatterns);
  const isGitignored = options.gitignore ? loadGitignore(root) : null;

  const extensions = getSupportedExtensions().map((ext) => ext.slice(1));
  const extPattern =
    extensions.length === 1 ? `*.${extensions[0]}` : `*.{${extensions.join(",")}}`;

  const filePaths = await fg(`**/${extPattern}`, {
    cwd: root,
    absolute: false,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
    // Prunes ignored directories early; the matcher below has the final word.
    ignore: directoryGlobs(options.ignorePatterns),
  });

  const discovered: DiscoveredFile[] = [];
  let skipped = 0;

  for (const relativePath of filePaths) {
    if (isIgnored(relativePath) || isGitignored?.(relativePath)) {
      skipped++;
      continue;
    }
    discovered.push({
      absolutePath: path.join(root, relativePath),
      relativePath,
    });
  }

  if (skipped > 0) logger.debug(`Ignored ${skipped} files matching ignore patterns`);

  // Sort by path for deterministic ordering
  discovered.sort((a, b) => compareCodeUnits(a.relativePath, b.relativePath));
  return discovered;
}
