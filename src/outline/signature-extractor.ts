import type Parser from "web-tree-sitter";
import type {
  Argument,
  ClassRecord,
  ExtractOptions,
  FileOutline,
  FunctionRecord,
  SignatureInfo,
  Verbosity,
} from "./types.js";
import { readDocstring } from "./docstring.js";

type SyntaxNode = Parser.SyntaxNode;

/** Parameter nodes after which only keyword arguments follow. */
const VARIADIC_PARAMETERS = new Set([
  "keyword_separator",
  "list_splat_pattern",
  "dictionary_splat_pattern",
]);

/**
 * Render a signature at the requested verbosity:
 *
 * - 0: `name`
 * - 1: `name(a, b=1)`
 * - 2: `name(a: int, b: int=1) -> str`
 * - 3: `name(int, ?) -> str`
 */
export function formatSignature(info: SignatureInfo, verbosity: Verbosity): string {
  const returns = info.returnType ? ` -> ${info.returnType}` : "";

  switch (verbosity) {
    case 0:
      return info.name;
    case 1:
      return `${info.name}(${info.args.map((a) => a.name + formatDefault(a)).join(", ")})`;
    case 2:
      return `${info.name}(${info.args
        .map((a) => a.name + (a.type ? `: ${a.type}` : "") + formatDefault(a))
        .join(", ")})${returns}`;
    case 3:
      return `${info.name}(${info.args.map((a) => a.type ?? "?").join(", ")})${returns}`;
  }
}

function formatDefault(arg: Argument): string {
  return arg.default !== undefined ? `=${arg.default}` : "";
}

/**
 * Positional parameters of a `parameters` node. Default expressions are
 * collected separately and bound to the trailing parameters, one per default.
 */
export function readArguments(parameters: SyntaxNode): Argument[] {
  const args: Argument[] = [];
  const defaults: string[] = [];

  for (const child of parameters.namedChildren) {
    if (VARIADIC_PARAMETERS.has(child.type)) break;

    if (child.type === "identifier") {
      args.push({ name: child.text });
    } else if (child.type === "typed_parameter") {
      const target = child.firstNamedChild;
      // `*args: int` and `**kwargs: str` end the positional list too
      if (!target || target.type !== "identifier") break;
      args.push(withType({ name: target.text }, child));
    } else if (
      child.type === "default_parameter" ||
      child.type === "typed_default_parameter"
    ) {
      const nameNode = child.childForFieldName("name");
      if (!nameNode) continue;
      args.push(withType({ name: nameNode.text }, child));
      const value = child.childForFieldName("value");
      if (value) defaults.push(value.text);
    }
  }

  const offset = args.length - defaults.length;
  defaults.forEach((value, i) => {
    const arg = args[offset + i];
    if (arg) arg.default = value;
  });

  return args;
}

function withType(arg: Argument, parameter: SyntaxNode): Argument {
  const typeNode = parameter.childForFieldName("type");
  if (typeNode) arg.type = typeNode.text;
  return arg;
}

export function readSignature(
  node: SyntaxNode,
  withDocstring: boolean,
): SignatureInfo | null {
  const nameNode = node.childForFieldName("name");
  if (!nameNode) return null;

  const parameters = node.childForFieldName("parameters");
  const returnType = node.childForFieldName("return_type");
  const info: SignatureInfo = {
    name: nameNode.text,
    args: parameters ? readArguments(parameters) : [],
  };
  if (returnType) info.returnType = returnType.text;
  if (withDocstring) {
    const docstring = readDocstring(node.childForFieldName("body"));
    if (docstring !== undefined) info.docstring = docstring;
  }
  return info;
}

/**
 * Build the outline of one module.
 *
 * Walks the tree once in source order. Function bodies are not entered, so
 * only module-level functions and class methods are reported. Open classes
 * are kept on a stack: a class nested in another is recorded as
 * `Outer.Inner`, and methods after it go back to `Outer`.
 */
export function extractOutline(tree: Parser.Tree, options: ExtractOptions): FileOutline {
  const outline: FileOutline = { classes: new Map(), functions: [] };
  const scopes: string[] = [];

  function recordFunction(node: SyntaxNode): void {
    const info = readSignature(node, options.docstrings);
    if (!info) return;

    const record: FunctionRecord = { signature: formatSignature(info, options.verbosity) };
    if (info.docstring !== undefined) record.docstring = info.docstring;

    const owner = scopes.at(-1);
    if (owner === undefined) {
      outline.functions.push(record);
    } else {
      outline.classes.get(owner)?.methods.set(info.name, record);
    }
  }

  function recordClass(node: SyntaxNode): void {
    const nameNode = node.childForFieldName("name");
    if (!nameNode) return;

    const enclosing = scopes.at(-1);
    const path = enclosing ? `${enclosing}.${nameNode.text}` : nameNode.text;
    const body = node.childForFieldName("body");

    const record: ClassRecord = { methods: new Map() };
    if (options.docstrings) {
      const docstring = readDocstring(body);
      if (docstring !== undefined) record.docstring = docstring;
    }
    outline.classes.set(path, record);

    if (!body) return;
    scopes.push(path);
    try {
      visit(body);
    } finally {
      scopes.pop();
    }
  }

  function visit(node: SyntaxNode): void {
    if (node.type === "function_definition") {
      recordFunction(node);
      return;
    }
    if (node.type === "class_definition") {
      recordClass(node);
      return;
    }
    for (const child of node.namedChildren) {
      visit(child);
    }
  }

  visit(tree.rootNode);
  return outline;
}

/** Python 2 statement forms the grammar still parses without an ERROR node. */
const LEGACY_STATEMENTS = ["print_statement", "exec_statement"];

/** The first `print x` or `exec code` statement in the tree, if any. */
export function findLegacyStatement(node: SyntaxNode): SyntaxNode | undefined {
  return node.descendantsOfType(LEGACY_STATEMENTS).at(0);
}

/**
 * Where the parser first gave up: the first ERROR node, or the deepest node
 * on the path to a missing token.
 */
export function locateSyntaxError(node: SyntaxNode): SyntaxNode {
  for (const child of node.children) {
    if (child.type === "ERROR") return child;
    if (child.hasError) return locateSyntaxError(child);
  }
  return node;
}
