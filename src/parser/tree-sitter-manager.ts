import Parser from "web-tree-sitter";
import * as path from "node:path";
import * as fs from "node:fs";
import { createRequire } from "node:module";
import { DEFAULT_LANGUAGE, getLanguageConfig, type LanguageConfig } from "./languages.js";
import { GrammarNotFoundError, OutlineError, UnsupportedLanguageError } from "../core/errors.js";
import { logger } from "../utils/logger.js";

const require = createRequire(import.meta.url);

let initialized = false;

/**
 * Owns the WASM runtime and one parser per loaded grammar. Loading is
 * asynchronous; parsing after `initialize()` is synchronous.
 */
export class TreeSitterManager {
  private parsers: Map<string, Parser> = new Map();

  async initialize(languageIds: string[] = [DEFAULT_LANGUAGE]): Promise<void> {
    if (!initialized) {
      await Parser.init();
      initialized = true;
    }

    for (const languageId of languageIds) {
      if (this.parsers.has(languageId)) continue;

      const config = getLanguageConfig(languageId);
      if (!config) throw new UnsupportedLanguageError(languageId);

      const language = await this.loadLanguage(config);
      this.parsers.set(languageId, this.createParser(language));
      logger.debug(`Loaded ${languageId} grammar`);
    }
  }

  createParser(language: Parser.Language): Parser {
    const parser = new Parser();
    parser.setLanguage(language);
    return parser;
  }

  /** Callers own the returned tree and must `delete()` it. */
  parse(source: string, languageId: string = DEFAULT_LANGUAGE): Parser.Tree {
    const parser = this.parsers.get(languageId);
    if (!parser) {
      throw new OutlineError(
        `Grammar for ${languageId} is not loaded. Call initialize() first.`,
      );
    }
    return parser.parse(source);
  }

  private async loadLanguage(config: LanguageConfig): Promise<Parser.Language> {
    const wasmPath = this.findWasmFile(config);
    if (!wasmPath) throw new GrammarNotFoundError(config.id);

    try {
      return await Parser.Language.load(wasmPath);
    } catch (err) {
      throw new GrammarNotFoundError(
        config.id,
        err instanceof Error ? err.message : String(err),
      );
    }
  }

  private findWasmFile(config: LanguageConfig): string | null {
    // Use require.resolve to find the tree-sitter-wasms package
    try {
      const wasmsDir = path.dirname(
        require.resolve("tree-sitter-wasms/package.json"),
      );
      const wasmPath = path.join(wasmsDir, "out", config.wasmFile);
      if (fs.existsSync(wasmPath)) return wasmPath;
    } catch {
      logger.debug("tree-sitter-wasms is not installed");
    }

    return null;
  }
}
