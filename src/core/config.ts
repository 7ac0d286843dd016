import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { Verbosity } from "../outline/types.js";

export const CONFIG_FILE_NAME = ".py-outline.json";

/** Caches, version control, virtual environments, bytecode, OS metadata. */
export const DEFAULT_IGNORE_PATTERNS = [
  "__pycache__/",
  ".mypy_cache/",
  ".pytest_cache/",
  ".ruff_cache/",
  ".tox/",
  ".git/",
  ".hg/",
  ".svn/",
  "venv/",
  ".venv/",
  "env/",
  ".env/",
  "virtualenv/",
  "*.pyc",
  "*.pyo",
  ".DS_Store",
  "Thumbs.db",
];

const fileConfigSchema = z
  .object({
    ignore: z.array(z.string().min(1)).optional(),
    arguments: z.boolean().optional(),
    types: z.boolean().optional(),
    docstrings: z.boolean().optional(),
    gitignore: z.boolean().optional(),
    color: z.boolean().optional(),
    pager: z.boolean().optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

/** Options as commander hands them over; unset flags are undefined. */
export interface CliFlags {
  arguments?: boolean;
  types?: boolean;
  docstrings?: boolean;
  ignore?: string[];
  gitignore?: boolean;
  config?: string;
  color?: boolean;
  pager?: boolean;
  verbose?: boolean;
}

export interface OutlineSettings {
  root: string;
  verbosity: Verbosity;
  docstrings: boolean;
  ignorePatterns: string[];
  gitignore: boolean;
  color: boolean;
  pager: boolean;
}

export interface TerminalInfo {
  /** Whether stdout can show ANSI colors (TTY and no NO_COLOR). */
  colorSupported: boolean;
}

export function resolveVerbosity(args: boolean, types: boolean): Verbosity {
  if (args && types) return 2;
  if (types) return 3;
  if (args) return 1;
  return 0;
}

/**
 * Read the JSON config for a run. An explicit path must exist; otherwise
 * `<root>/.py-outline.json` is used when present and `{}` when not.
 */
export function loadFileConfig(root: string, explicitPath?: string): FileConfig {
  const configPath = explicitPath
    ? path.resolve(explicitPath)
    : path.join(root, CONFIG_FILE_NAME);

  if (!fs.existsSync(configPath)) {
    if (explicitPath) throw new ConfigError(configPath, "file not found");
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new ConfigError(configPath, err instanceof Error ? err.message : String(err));
  }

  const parsed = fileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(configPath, detail);
  }
  return parsed.data;
}

/**
 * Merge flags over the config file over defaults. `--no-color` and
 * `--no-pager` are the only ways a flag can turn those off, so a `true`
 * there is commander's default and the config file may still override it.
 */
export function resolveSettings(
  root: string,
  flags: CliFlags,
  fileConfig: FileConfig,
  terminal: TerminalInfo,
): OutlineSettings {
  const args = flags.arguments ?? fileConfig.arguments ?? false;
  const types = flags.types ?? fileConfig.types ?? false;

  return {
    root,
    verbosity: resolveVerbosity(args, types),
    docstrings: flags.docstrings ?? fileConfig.docstrings ?? false,
    ignorePatterns: [
      ...DEFAULT_IGNORE_PATTERNS,
      ...(fileConfig.ignore ?? []),
      ...(flags.ignore ?? []),
    ],
    gitignore: flags.gitignore ?? fileConfig.gitignore ?? false,
    color:
      flags.color === false
        ? false
        : (fileConfig.color ?? true) && terminal.colorSupported,
    pager: flags.pager === false ? false : (fileConfig.pager ?? true),
  };
}
