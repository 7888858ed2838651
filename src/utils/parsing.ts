/**
 * Strict numeric parsing for instrument replies.
 *
 * `parseFloat('1.2abc')` happily returns 1.2; these do not.
 */

const NUMBER_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;
const INTEGER_PATTERN = /^[-+]?\d+$/;

export function parseNumber(text: string): number | null {
  const trimmed = text.trim();
  if (!NUMBER_PATTERN.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

export function parseInteger(text: string): number | null {
  const trimmed = text.trim();
  if (!INTEGER_PATTERN.test(trimmed)) return null;
  return parseInt(trimmed, 10);
}
