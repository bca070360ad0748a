/**
 * Dense rank by a numeric value, highest first. Equal values share a rank
 * and the next distinct value gets rank + 1. `tieBreak` only orders rows
 * within a rank; it never changes the rank.
 */
export function denseRankDesc<T>(
  rows: readonly T[],
  value: (row: T) => number,
  tieBreak: (a: T, b: T) => number = () => 0
): { row: T; rank: number }[] {
  const sorted = [...rows].sort((a, b) => value(b) - value(a) || tieBreak(a, b));

  const ranked: { row: T; rank: number }[] = [];
  let rank = 0;
  let previous: number | undefined;
  for (const row of sorted) {
    const v = value(row);
    if (previous === undefined || v !== previous) {
      rank++;
      previous = v;
    }
    ranked.push({ row, rank });
  }
  return ranked;
}
