import type { OutlineReport } from "../outline/pipeline.js";
import type { ClassRecord, FileOutline, FunctionRecord } from "../outline/types.js";
import { createPalette, type Palette } from "../utils/colors.js";
import { compareCodeUnits } from "../utils/compare.js";

export interface FormatOptions {
  color?: boolean;
}

const INDENT = "  ";

export function isEmptyOutline(outline: FileOutline): boolean {
  return outline.functions.length === 0 && outline.classes.size === 0;
}

function pushDocstring(
  lines: string[],
  docstring: string | undefined,
  depth: number,
  c: Palette,
): void {
  if (!docstring) return;
  const pad = INDENT.repeat(depth);
  for (const line of docstring.split("\n")) {
    lines.push(line.length > 0 ? pad + c.dim(line) : "");
  }
}

function pushFunction(lines: string[], fn: FunctionRecord, depth: number, c: Palette): void {
  lines.push(INDENT.repeat(depth) + c.green(fn.signature));
  pushDocstring(lines, fn.docstring, depth + 1, c);
}

function pushClass(
  lines: string[],
  name: string,
  record: ClassRecord,
  c: Palette,
): void {
  lines.push(INDENT.repeat(2) + c.yellow(name));
  pushDocstring(lines, record.docstring, 3, c);

  const methods = [...record.methods.entries()].sort(([a], [b]) => compareCodeUnits(a, b));
  for (const [, method] of methods) {
    pushFunction(lines, method, 3, c);
  }
}

/**
 * Outline of one file: a header with its path, then a `Functions:` section
 * sorted by signature and a `Classes:` section sorted by class name, each
 * class followed by its methods sorted by name. Empty sections are left out.
 */
export function formatFileOutline(
  filePath: string,
  outline: FileOutline,
  options: FormatOptions = {},
): string {
  const c = createPalette(options.color ?? false);
  const lines: string[] = [c.bold(c.cyan(filePath))];

  if (outline.functions.length > 0) {
    lines.push(INDENT + c.bold("Functions:"));
    const functions = [...outline.functions].sort((a, b) =>
      compareCodeUnits(a.signature, b.signature),
    );
    for (const fn of functions) {
      pushFunction(lines, fn, 2, c);
    }
  }

  if (outline.classes.size > 0) {
    lines.push(INDENT + c.bold("Classes:"));
    const classes = [...outline.classes.entries()].sort(([a], [b]) => compareCodeUnits(a, b));
    for (const [name, record] of classes) {
      pushClass(lines, name, record, c);
    }
  }

  return lines.join("\n");
}

export function formatErrors(errors: string[], options: FormatOptions = {}): string {
  const c = createPalette(options.color ?? false);
  return [c.bold(c.red("Errors:")), ...errors.map((e) => INDENT + c.red(e))].join("\n");
}

/**
 * The whole report: one block per file that defines anything, separated by
 * blank lines, then the errors of the files that failed.
 */
export function formatReport(report: OutlineReport, options: FormatOptions = {}): string {
  const blocks: string[] = [];

  for (const file of report.files) {
    if (!file.ok || isEmptyOutline(file.outline)) continue;
    blocks.push(formatFileOutline(file.path, file.outline, options));
  }

  if (report.errors.length > 0) {
    blocks.push(formatErrors(report.errors, options));
  }

  return blocks.length > 0 ? blocks.join("\n\n") + "\n" : "";
}
