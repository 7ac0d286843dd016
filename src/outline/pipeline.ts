import * as fs from "node:fs";
import * as path from "node:path";
import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import type Parser from "web-tree-sitter";
import { discoverFiles, type DiscoveredFile } from "./file-discovery.js";
import {
  extractOutline,
  findLegacyStatement,
  locateSyntaxError,
} from "./signature-extractor.js";
import type { ExtractOptions, FileResult } from "./types.js";
import { TreeSitterManager } from "../parser/tree-sitter-manager.js";
import { DEFAULT_LANGUAGE, detectLanguage } from "../parser/languages.js";
import { InvalidDirectoryError, SourceParseError } from "../core/errors.js";
import { logger } from "../utils/logger.js";

export interface OutlineOptions extends ExtractOptions {
  root: string;
  ignorePatterns: string[];
  gitignore?: boolean;
}

export interface OutlineReport {
  /** Absolute root directory. */
  root: string;
  files: FileResult[];
  /** Failure messages of `files`, in file order. */
  errors: string[];
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Read a whole file as strict UTF-8; invalid bytes throw. */
export function readSourceFile(filePath: string): string {
  return utf8.decode(fs.readFileSync(filePath));
}

/**
 * Parse and outline one module. Syntax errors and any exception raised on
 * the way come back as a failed result naming `displayPath`.
 */
export function outlineSource(
  source: string,
  displayPath: string,
  manager: TreeSitterManager,
  options: ExtractOptions,
  languageId: string = DEFAULT_LANGUAGE,
): FileResult {
  let tree: Parser.Tree | null = null;
  try {
    tree = manager.parse(source, languageId);
    if (tree.rootNode.hasError) {
      const at = locateSyntaxError(tree.rootNode).startPosition;
      throw new SourceParseError(at.row + 1, at.column + 1);
    }
    const legacy = findLegacyStatement(tree.rootNode);
    if (legacy) {
      const at = legacy.startPosition;
      throw new SourceParseError(at.row + 1, at.column + 1);
    }
    return { ok: true, path: displayPath, outline: extractOutline(tree, options) };
  } catch (err) {
    return {
      ok: false,
      path: displayPath,
      error: `Error parsing ${displayPath}: ${errorText(err)}`,
    };
  } finally {
    tree?.delete();
  }
}

export function outlineFile(
  file: DiscoveredFile,
  manager: TreeSitterManager,
  options: ExtractOptions,
): FileResult {
  let source: string;
  try {
    source = readSourceFile(file.absolutePath);
  } catch (err) {
    return {
      ok: false,
      path: file.relativePath,
      error: `Error reading ${file.relativePath}: ${errorText(err)}`,
    };
  }
  const languageId = detectLanguage(file.relativePath) ?? DEFAULT_LANGUAGE;
  return outlineSource(source, file.relativePath, manager, options, languageId);
}

function assertDirectory(root: string): void {
  let stat: fs.Stats;
  try {
    stat = fs.statSync(root);
  } catch {
    throw new InvalidDirectoryError(root, "no such directory");
  }
  if (!stat.isDirectory()) {
    throw new InvalidDirectoryError(root, "not a directory");
  }
}

export async function runOutline(
  options: OutlineOptions,
  manager: TreeSitterManager = new TreeSitterManager(),
): Promise<OutlineReport> {
  const root = path.resolve(options.root);
  assertDirectory(root);

  await manager.initialize();

  const discovered = await discoverFiles(root, {
    ignorePatterns: options.ignorePatterns,
    gitignore: options.gitignore,
  });
  logger.debug(`Found ${discovered.length} Python files under ${root}`);

  const files: FileResult[] = [];
  for (const file of discovered) {
    const result = outlineFile(file, manager, options);
    if (!result.ok) logger.debug(result.error);
    files.push(result);
    // Between files, so an interrupt does not wait for the whole tree
    await yieldToEventLoop();
  }

  const errors = files.flatMap((f) => (f.ok ? [] : [f.error]));
  return { root, files, errors };
}
