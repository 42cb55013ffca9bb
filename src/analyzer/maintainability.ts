/**
 * Maintainability Index, rescaled to 0..100:
 *
 *   MI = max(0, (171 - 5.2 ln V - 0.23 G - 16.2 ln L) * 100 / 171)
 *
 * where V is the Halstead volume, G the summed cyclomatic complexity of
 * every unit and L the number of non-blank lines. Advisory only.
 */

export function maintainabilityIndex(
  volume: number,
  totalComplexity: number,
  sourceLines: number,
): number {
  // An empty file has nothing to maintain.
  if (volume <= 0 || sourceLines <= 0) {
    return 100;
  }
  const raw = 171 - 5.2 * Math.log(volume) - 0.23 * totalComplexity - 16.2 * Math.log(sourceLines);
  return Math.min(100, Math.max(0, (raw * 100) / 171));
}
