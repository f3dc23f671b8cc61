/**
 * Number Utilities
 */

/**
 * Rounds to the nearest integer; exact halves go to the even neighbour.
 * Example: 0.5 -> 0, 1.5 -> 2, 2.5 -> 2, -2.5 -> -2
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) return floor + 1;
  if (fraction < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}
