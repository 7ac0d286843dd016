import type Parser from "web-tree-sitter";

const STRING_LITERAL = /^([A-Za-z]*)("""|'''|"|')([\s\S]*)\2$/;

const SIMPLE_ESCAPES: Record<string, string> = {
  "\\": "\\",
  "'": "'",
  '"': '"',
  a: "\x07",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
  v: "\v",
};

/**
 * The docstring of a function or class body: its first statement, when that
 * statement is a plain string literal or adjacent plain literals (`"a" "b"`).
 * Comments ahead of it are skipped.
 */
export function readDocstring(body: Parser.SyntaxNode | null): string | undefined {
  const first = body?.namedChildren.find((child) => child.type !== "comment");
  if (!first || first.type !== "expression_statement" || first.namedChildCount !== 1) {
    return undefined;
  }
  const literal = first.firstNamedChild;
  if (literal?.type === "string") return parseStringLiteral(literal.text);
  if (literal?.type === "concatenated_string") {
    return parseConcatenatedString(
      literal.namedChildren.filter((part) => part.type === "string").map((part) => part.text),
    );
  }
  return undefined;
}

/**
 * Value of a string literal as a docstring. Byte strings and f-strings are
 * not docstrings and give undefined.
 */
export function parseStringLiteral(literal: string): string | undefined {
  const value = literalValue(literal);
  return value === undefined ? undefined : nonEmpty(cleanDocstring(value));
}

/** Adjacent literals joined into one docstring; any byte or f-string part spoils it. */
export function parseConcatenatedString(literals: string[]): string | undefined {
  let joined = "";
  for (const literal of literals) {
    const value = literalValue(literal);
    if (value === undefined) return undefined;
    joined += value;
  }
  return nonEmpty(cleanDocstring(joined));
}

function literalValue(literal: string): string | undefined {
  const match = STRING_LITERAL.exec(literal);
  if (!match) return undefined;

  const prefix = (match[1] ?? "").toLowerCase();
  if (prefix.includes("b") || prefix.includes("f")) return undefined;

  const raw = match[3] ?? "";
  return prefix.includes("r") ? raw : decodeEscapes(raw);
}

function nonEmpty(text: string): string | undefined {
  return text.length > 0 ? text : undefined;
}

export function decodeEscapes(text: string): string {
  return text.replace(
    /\\(\r?\n|x[0-9a-fA-F]{2}|u[0-9a-fA-F]{4}|U[0-9a-fA-F]{8}|[0-7]{1,3}|.)/g,
    (whole, escape: string) => {
      if (escape.startsWith("\n") || escape.startsWith("\r")) return "";
      if (/^[xuU]/.test(escape) && escape.length > 1) {
        const codePoint = parseInt(escape.slice(1), 16);
        return codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : whole;
      }
      if (/^[0-7]+$/.test(escape)) return String.fromCodePoint(parseInt(escape, 8));
      return SIMPLE_ESCAPES[escape] ?? whole;
    },
  );
}

function expandTabs(line: string, size = 8): string {
  let out = "";
  for (const ch of line) {
    out += ch === "\t" ? " ".repeat(size - (out.length % size)) : ch;
  }
  return out;
}

/**
 * Strip docstring indentation: the first line loses its leading whitespace,
 * the rest lose their common indentation, and blank lines at either end go.
 */
export function cleanDocstring(text: string): string {
  const lines = text.split(/\r?\n/).map((line) => expandTabs(line));

  let margin = Infinity;
  for (const line of lines.slice(1)) {
    const content = line.trimStart();
    if (content.length > 0) {
      margin = Math.min(margin, line.length - content.length);
    }
  }

  const cleaned = lines.map((line, i) => {
    if (i === 0) return line.trimStart();
    return margin === Infinity ? line : line.slice(margin);
  });

  while (cleaned.length > 0 && (cleaned[0] ?? "").trim() === "") cleaned.shift();
  while (cleaned.length > 0 && (cleaned[cleaned.length - 1] ?? "").trim() === "") {
    cleaned.pop();
  }
  return cleaned.join("\n");
}
