// ANSI color codes
export const COLORS = {
  green: '\x1b[32m',
  cyan: '\x1b[36m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
  red: '\x1b[31m',
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  bold: '\x1b[1m',
};

// Cursor control
export const CURSOR = {
  hide: '\x1b[?25l',
  show: '\x1b[?25h',
};

// Piped output and NO_COLOR get plain text.
export function colorEnabled(stream: { isTTY?: boolean } = process.stdout, env: NodeJS.ProcessEnv = process.env): boolean {
  return stream.isTTY === true && env.NO_COLOR === undefined;
}

const paint = (code: string) => (s: string) => (colorEnabled() ? `${code}${s}${COLORS.reset}` : s);

export const green = paint(COLORS.green);
export const cyan = paint(COLORS.cyan);
export const yellow = paint(COLORS.yellow);
export const magenta = paint(COLORS.magenta);
export const red = paint(COLORS.red);
export const dim = paint(COLORS.dim);
export const bold = paint(COLORS.bold);
