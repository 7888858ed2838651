/**
 * JSON encoding for measurement values.
 *
 * JSON has no literal for non-finite numbers. An infinite resistance is a
 * real result and goes out as the string "Infinity" (or "-Infinity"); NaN
 * marks a reading that failed and goes out as null.
 */
export function encodeNonFinite(_key: string, value: unknown): unknown {
  if (typeof value !== 'number' || Number.isFinite(value)) return value;
  if (Number.isNaN(value)) return null;
  return value > 0 ? 'Infinity' : '-Infinity';
}
