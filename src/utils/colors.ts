export interface Palette {
  dim: (s: string) => string;
  red: (s: string) => string;
  green: (s: string) => string;
  yellow: (s: string) => string;
  cyan: (s: string) => string;
  bold: (s: string) => string;
}

const ansi = (open: number, close: number) => (s: string) =>
  `\x1b[${open}m${s}\x1b[${close}m`;

const COLORS: Palette = {
  dim: ansi(2, 22),
  red: ansi(31, 39),
  green: ansi(32, 39),
  yellow: ansi(33, 39),
  cyan: ansi(36, 39),
  bold: ansi(1, 22),
};

const identity = (s: string) => s;

const PLAIN: Palette = {
  dim: identity,
  red: identity,
  green: identity,
  yellow: identity,
  cyan: identity,
  bold: identity,
};

export function createPalette(enabled: boolean): Palette {
  return enabled ? COLORS : PLAIN;
}

export function supportsColor(
  stream: { isTTY?: boolean },
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  if (env.NO_COLOR !== undefined && env.NO_COLOR !== "") return false;
  if (env.FORCE_COLOR !== undefined && env.FORCE_COLOR !== "0") return true;
  return stream.isTTY === true;
}
