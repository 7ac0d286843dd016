import { spawnSync } from "node:child_process";
import { logger } from "./logger.js";

export interface OutputStream {
  isTTY?: boolean;
  rows?: number;
  write(chunk: string): boolean;
}

export interface PagerOptions {
  enabled: boolean;
  /** Value of `$PAGER`; `less -R` when unset or blank. */
  command?: string;
}

export function resolvePagerCommand(command?: string): [string, ...string[]] {
  const parts = (command ?? "").trim().split(/\s+/).filter(Boolean);
  const [program, ...args] = parts;
  return program ? [program, ...args] : ["less", "-R"];
}

/** Page only on a terminal, and only when the text is taller than it. */
export function shouldPage(text: string, stream: OutputStream): boolean {
  if (!stream.isTTY || !stream.rows) return false;
  const lineCount = text.endsWith("\n")
    ? text.split("\n").length - 1
    : text.split("\n").length;
  return lineCount > stream.rows;
}

/**
 * Write `text` through the pager when paging applies, otherwise straight to
 * the stream. A pager that fails to start falls back to the stream.
 */
export function writeWithPager(
  text: string,
  stream: OutputStream,
  options: PagerOptions,
): void {
  if (!options.enabled || !shouldPage(text, stream)) {
    stream.write(text);
    return;
  }

  const [program, ...args] = resolvePagerCommand(options.command);
  const result = spawnSync(program, args, {
    input: text,
    stdio: ["pipe", "inherit", "inherit"],
  });

  if (result.error) {
    logger.debug(`Pager ${program} unavailable: ${result.error.message}`);
    stream.write(text);
  }
}
