// Color support: disable if NO_COLOR is set or stdout is not a TTY
export const useColors = !process.env.NO_COLOR && Boolean(process.stdout.isTTY);

// ANSI color codes (only used when colors are enabled)
export const colors = {
  reset: useColors ? "\x1b[0m" : "",
  bold: useColors ? "\x1b[1m" : "",
  dim: useColors ? "\x1b[2m" : "",
  red: useColors ? "\x1b[31m" : "",
  green: useColors ? "\x1b[32m" : "",
  yellow: useColors ? "\x1b[33m" : "",
  cyan: useColors ? "\x1b[36m" : "",
};

/**
 * Status markers for per-file progress lines.
 */
export const marks = {
  ok: `${colors.green}✓${colors.reset}`,
  same: `${colors.dim}·${colors.reset}`,
  warn: `${colors.yellow}!${colors.reset}`,
};
