export interface LanguageConfig {
  id: string;
  extensions: string[];
  /** Grammar file inside the tree-sitter-wasms package's `out/` directory. */
  wasmFile: string;
}

export const LANGUAGES: Record<string, LanguageConfig> = {
  python: {
    id: "python",
    extensions: [".py", ".pyw"],
    wasmFile: "tree-sitter-python.wasm",
  },
};

export const DEFAULT_LANGUAGE = "python";

const extensionMap = new Map<string, LanguageConfig>();
for (const lang of Object.values(LANGUAGES)) {
  for (const ext of lang.extensions) {
    extensionMap.set(ext, lang);
  }
}

export function detectLanguage(filePath: string): string | null {
  const basename = filePath.split(/[/\\]/).pop() ?? filePath;
  const dotIndex = basename.lastIndexOf(".");
  // No extension, or dotfile without a further extension (e.g., ".pythonrc")
  if (dotIndex <= 0) return null;
  const ext = basename.substring(dotIndex).toLowerCase();
  const lang = extensionMap.get(ext);
  return lang?.id ?? null;
}

export function getLanguageConfig(
  languageId: string,
): LanguageConfig | undefined {
  return LANGUAGES[languageId];
}

export function getSupportedExtensions(): string[] {
  return [...extensionMap.keys()];
}
