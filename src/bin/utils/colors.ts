/**
 * ANSI color helpers with TTY detection.
 * Colors are off when not writing to a TTY or when NO_COLOR is set.
 */

/**
 * Evaluated on every call so tests can flip NO_COLOR and isTTY.
 * @internal Exported for testing
 */
export function shouldUseColor(stream: { isTTY?: boolean } = process.stdout): boolean {
  return Boolean(stream.isTTY && !process.env.NO_COLOR);
}

const wrap =
  (code: number, stream?: { isTTY?: boolean }) =>
  (s: string): string =>
    shouldUseColor(stream) ? `\x1b[${code}m${s}\x1b[0m` : s;

export const colors = {
  dim: wrap(2),
  bold: wrap(1),
};

/** Colors for text written to stderr. */
export const errorColors = {
  red: wrap(31, process.stderr),
  bold: wrap(1, process.stderr),
};
