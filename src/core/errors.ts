export class OutlineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OutlineError";
  }
}

export class InvalidDirectoryError extends OutlineError {
  constructor(directory: string, reason: string) {
    super(`Invalid directory ${directory}: ${reason}`);
    this.name = "InvalidDirectoryError";
  }
}

export class ConfigError extends OutlineError {
  constructor(configPath: string, detail: string) {
    super(`Invalid config at ${configPath}: ${detail}`);
    this.name = "ConfigError";
  }
}

export class GrammarNotFoundError extends OutlineError {
  constructor(language: string, detail?: string) {
    super(
      detail
        ? `Failed to load grammar for ${language}: ${detail}`
        : `No WASM grammar found for ${language}. Is tree-sitter-wasms installed?`,
    );
    this.name = "GrammarNotFoundError";
  }
}

export class UnsupportedLanguageError extends OutlineError {
  constructor(language: string) {
    super(`Unsupported language: ${language}`);
    this.name = "UnsupportedLanguageError";
  }
}

/** A source file the parser could not turn into a clean syntax tree. */
export class SourceParseError extends OutlineError {
  readonly line: number;
  readonly column: number;

  constructor(line: number, column: number) {
    super(`invalid syntax at line ${line}, column ${column}`);
    this.name = "SourceParseError";
    this.line = line;
    this.column = column;
  }
}
