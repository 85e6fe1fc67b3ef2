import type { GameResult, ResultSet } from './game-result';

function resultKey(result: GameResult): string {
  return JSON.stringify([result.sender, result.game, result.puzzleNum]);
}

/**
 * Combines exported results with results pasted from conversations.
 * For each (sender, game, puzzle) only the fastest time survives; on equal times the
 * one that came first (primary before secondary) is kept. The merged set is ordered
 * by time, fastest first.
 *
 * When `secondary` is empty, `primary` comes back untouched, in its original order.
 */
export function mergeResults(primary: ResultSet, secondary: ResultSet): ResultSet {
  if (secondary.length === 0) return primary;

  // Sort on (time, original index) so the tie-break never depends on sort stability
  const ranked = [...primary, ...secondary]
    .map((result, index) => ({ result, index }))
    .sort((a, b) => a.result.timeSec - b.result.timeSec || a.index - b.index);

  const seen = new Set<string>();
  const merged: GameResult[] = [];
  for (const { result } of ranked) {
    const key = resultKey(result);
    if (seen.has(key)) continue;
    seen.add(key);
    merged.push(result);
  }
  return merged;
}
