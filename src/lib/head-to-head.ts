import { GAMES } from './games-constants';
import type { Duel, DuelWinner, GameScore, ResultSet, ScoreReport, ScoreTally } from './game-result';

/** Best (lowest) time per puzzle for one sender in one game. */
export function bestTimesByPuzzle(
  results: ResultSet,
  sender: string,
  game: string
): Map<number, number> {
  const best = new Map<number, number>();
  for (const result of results) {
    if (result.sender !== sender || result.game !== game) continue;
    const current = best.get(result.puzzleNum);
    if (current === undefined || result.timeSec < current) {
      best.set(result.puzzleNum, result.timeSec);
    }
  }
  return best;
}

export function duelWinner(myTime: number, contactTime: number): DuelWinner {
  if (myTime < contactTime) return 'me';
  if (contactTime < myTime) return 'contact';
  return 'tie';
}

/** Duels on every puzzle both players solved, in puzzle order. */
export function scoreGame(
  results: ResultSet,
  me: string,
  contact: string,
  game: string
): GameScore {
  const mine = bestTimesByPuzzle(results, me, game);
  const theirs = bestTimesByPuzzle(results, contact, game);
  const score: GameScore = { game, me: 0, contact: 0, tie: 0, duels: [] };

  const shared = [...mine.keys()].filter((puzzleNum) => theirs.has(puzzleNum)).sort((a, b) => a - b);

  for (const puzzleNum of shared) {
    const myTime = mine.get(puzzleNum) ?? 0;
    const contactTime = theirs.get(puzzleNum) ?? 0;
    const winner = duelWinner(myTime, contactTime);
    score[winner] += 1;

    const duel: Duel = { puzzleNum, myTime, contactTime, winner };
    score.duels.push(duel);
  }

  return score;
}

export function tallyTotals(scores: readonly ScoreTally[]): ScoreTally {
  return scores.reduce<ScoreTally>(
    (totals, score) => ({
      me: totals.me + score.me,
      contact: totals.contact + score.contact,
      tie: totals.tie + score.tie,
    }),
    { me: 0, contact: 0, tie: 0 }
  );
}

/**
 * Head-to-head score between `me` and `contact` across the game catalogue.
 * Lower time wins a duel; every game counts the same towards the totals.
 */
export function computeScores(
  results: ResultSet,
  me: string,
  contact: string,
  games: readonly string[] = GAMES
): ScoreReport {
  const scores = games.map((game) => scoreGame(results, me, contact, game));
  return { games: scores, totals: tallyTotals(scores) };
}

export function getGameScore(report: ScoreReport, game: string): GameScore | undefined {
  return report.games.find((score) => score.game === game);
}

export function playedCount(tally: ScoreTally): number {
  return tally.me + tally.contact + tally.tie;
}

/** Who is ahead on wins; 'tie' when level (ties themselves don't count). */
export function leaderOf(tally: ScoreTally): DuelWinner {
  if (tally.me > tally.contact) return 'me';
  if (tally.contact > tally.me) return 'contact';
  return 'tie';
}
