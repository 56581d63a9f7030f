/**
 * Terminal colors for human-facing output
 *
 * - brand: Green - Name and version
 * - muted: Gray - Examples, hints
 * - warn: Amber - Non-fatal notices
 */

export const colors = {
  brand: "#17DB4E",
  muted: "#585858",
  warn: "#ffaf00",
} as const;

export type Color = (typeof colors)[keyof typeof colors];

/**
 * Converts a hex color to ANSI escape code for true color (24-bit) terminals.
 */
export const hexToAnsi = (hex: string): string => {
  const cleaned = hex.replace("#", "");
  const r = Number.parseInt(cleaned.slice(0, 2), 16);
  const g = Number.parseInt(cleaned.slice(2, 4), 16);
  const b = Number.parseInt(cleaned.slice(4, 6), 16);
  return `\x1b[38;2;${r};${g};${b}m`;
};

export const ANSI_RESET = "\x1b[0m";

/**
 * Wraps text in a color when the stream is a terminal.
 */
export const paint = (
  text: string,
  color: Color,
  stream: { isTTY?: boolean } = process.stdout
): string => (stream.isTTY ? `${hexToAnsi(color)}${text}${ANSI_RESET}` : text);
