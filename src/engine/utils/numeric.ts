/**
 * Clamp a value to [min, max].
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Round for display without trailing float noise (e.g. 0.30000000000000004 → 0.3). */
export function roundTo(value: number, decimals: number): number {
  return parseFloat(value.toFixed(decimals));
}

/**
 * Linear interpolation through a sorted lookup table, clamped at both ends.
 * `table` must be sorted by ascending x.
 */
export function interpolateTable(table: ReadonlyArray<readonly [number, number]>, x: number): number {
  const first = table[0];
  const last = table[table.length - 1];
  if (x <= first[0]) return first[1];
  if (x >= last[0]) return last[1];
  for (let i = 1; i < table.length; i++) {
    const [x1, y1] = table[i];
    if (x <= x1) {
      const [x0, y0] = table[i - 1];
      return y0 + ((x - x0) / (x1 - x0)) * (y1 - y0);
    }
  }
  return last[1];
}
