/**
 * Shapes produced by the signature extractor and consumed by the formatter.
 */

/** How much argument and type detail a rendered signature carries. */
export type Verbosity = 0 | 1 | 2 | 3;

export interface Argument {
  name: string;
  /** Annotation source text, when the parameter is annotated. */
  type?: string;
  /** Default-value source text; only the trailing parameters carry one. */
  default?: string;
}

export interface SignatureInfo {
  name: string;
  args: Argument[];
  returnType?: string;
  docstring?: string;
}

export interface FunctionRecord {
  signature: string;
  docstring?: string;
}

export interface ClassRecord {
  /** Keyed by method name; a later definition replaces an earlier one. */
  methods: Map<string, FunctionRecord>;
  docstring?: string;
}

export interface FileOutline {
  /** Keyed by dotted class path (`Outer.Inner` for nested classes). */
  classes: Map<string, ClassRecord>;
  /** Module-level functions in source order. */
  functions: FunctionRecord[];
}

export interface ExtractOptions {
  verbosity: Verbosity;
  docstrings: boolean;
}

export type FileResult =
  | { ok: true; path: string; outline: FileOutline }
  | { ok: false; path: string; error: string };
