/**
 * ANSI escape code helpers for terminal reports.
 */

// ---------------------------------------------------------------------------
// ANSI codes
// ---------------------------------------------------------------------------

export const ANSI = {
  RESET: '\x1b[0m',
  BOLD: '\x1b[1m',
  DIM: '\x1b[2m',

  RED: '\x1b[31m',
  GREEN: '\x1b[32m',
  YELLOW: '\x1b[33m',
  CYAN: '\x1b[36m',
  BRIGHT_BLACK: '\x1b[90m',
} as const

// ---------------------------------------------------------------------------
// Color helpers
// ---------------------------------------------------------------------------

/** Check if color output is supported. */
export function supportsColor(isTTY: boolean): boolean {
  if (process.env.NO_COLOR !== undefined) return false
  return isTTY
}

/** Wrap text with an ANSI color code (only if color is enabled). */
export function colorize(text: string, code: string, useColor: boolean): string {
  if (!useColor) return text
  return `${code}${text}${ANSI.RESET}`
}

/** Bold text. */
export function bold(text: string, useColor: boolean): string {
  if (!useColor) return text
  return `${ANSI.BOLD}${text}${ANSI.RESET}`
}

/** Dim text. */
export function dim(text: string, useColor: boolean): string {
  if (!useColor) return text
  return `${ANSI.DIM}${text}${ANSI.RESET}`
}

// ---------------------------------------------------------------------------
// Layout
// ---------------------------------------------------------------------------

/**
 * Truncate a string to fit within maxWidth characters.
 * Adds ellipsis if truncated.
 */
export function truncate(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return ''
  if (text.length <= maxWidth) return text
  if (maxWidth <= 3) return text.slice(0, maxWidth)
  return text.slice(0, maxWidth - 3) + '...'
}

/**
 * Pad or truncate a string to exactly `width` characters.
 */
export function padOrTruncate(text: string, width: number, padChar = ' '): string {
  if (text.length > width) return truncate(text, width)
  return text.padEnd(width, padChar)
}
