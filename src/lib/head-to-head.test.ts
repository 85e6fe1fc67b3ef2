import { describe, it, expect } from 'vitest';
import {
  bestTimesByPuzzle,
  computeScores,
  duelWinner,
  getGameScore,
  leaderOf,
  playedCount,
  scoreGame,
} from './head-to-head';
import type { GameResult, GameScore } from './game-result';

const result = (sender: string, game: string, puzzleNum: number, timeSec: number): GameResult => ({
  sender,
  date: null,
  game,
  puzzleNum,
  timeSec,
});

describe('head-to-head', () => {
  const results: GameResult[] = [
    result('Ana', 'Tango', 1, 40),
    result('Luis', 'Tango', 1, 50),
    result('Ana', 'Zip', 9, 30),
    result('Luis', 'Zip', 9, 30),
    result('Ana', 'Zip', 3, 25),
    result('Luis', 'Zip', 3, 20),
    result('Ana', 'Zip', 4, 20),
    result('Luis', 'Queens', 12, 110),
  ];

  describe('computeScores', () => {
    it('awards a duel to the faster player', () => {
      const report = computeScores([result('Ana', 'Tango', 1, 40), result('Luis', 'Tango', 1, 50)], 'Ana', 'Luis');
      expect(getGameScore(report, 'Tango')).toEqual({
        game: 'Tango',
        me: 1,
        contact: 0,
        tie: 0,
        duels: [{ puzzleNum: 1, myTime: 40, contactTime: 50, winner: 'me' }],
      });
    });

    it('scores every game in catalogue order and sums the totals', () => {
      const report = computeScores(results, 'Ana', 'Luis');

      expect(report.games.map((g) => g.game)).toEqual(['Tango', 'Queens', 'Zip', 'Mini Sudoku']);
      expect(getGameScore(report, 'Zip')?.duels).toEqual([
        { puzzleNum: 3, myTime: 25, contactTime: 20, winner: 'contact' },
        { puzzleNum: 9, myTime: 30, contactTime: 30, winner: 'tie' },
      ]);
      expect(report.totals).toEqual({ me: 1, contact: 1, tie: 1 });
    });

    it('gives empty scores for games without shared puzzles', () => {
      const report = computeScores(results, 'Ana', 'Luis');
      const empty: GameScore = { game: 'Queens', me: 0, contact: 0, tie: 0, duels: [] };
      expect(getGameScore(report, 'Queens')).toEqual(empty);
      expect(getGameScore(report, 'Mini Sudoku')?.duels).toEqual([]);
    });

    it('mirrors the report when the players swap sides', () => {
      const forward = computeScores(results, 'Ana', 'Luis');
      const backward = computeScores(results, 'Luis', 'Ana');

      expect(backward.totals).toEqual({ me: forward.totals.contact, contact: forward.totals.me, tie: forward.totals.tie });
      const flip = { me: 'contact', contact: 'me', tie: 'tie' } as const;
      forward.games.forEach((score, i) => {
        expect(backward.games[i].duels).toEqual(
          score.duels.map((d) => ({
            puzzleNum: d.puzzleNum,
            myTime: d.contactTime,
            contactTime: d.myTime,
            winner: flip[d.winner],
          }))
        );
      });
    });

    it('uses a custom game list', () => {
      const report = computeScores(results, 'Ana', 'Luis', ['Zip']);
      expect(report.games).toHaveLength(1);
      expect(report.totals).toEqual({ me: 0, contact: 1, tie: 1 });
    });
  });

  describe('scoreGame', () => {
    it('uses each player\'s best time on repeated attempts', () => {
      const attempts = [
        result('Ana', 'Zip', 7, 50),
        result('Ana', 'Zip', 7, 29),
        result('Luis', 'Zip', 7, 31),
      ];
      expect(scoreGame(attempts, 'Ana', 'Luis', 'Zip').duels).toEqual([
        { puzzleNum: 7, myTime: 29, contactTime: 31, winner: 'me' },
      ]);
    });

    it('orders duels by puzzle number numerically', () => {
      const attempts = [10, 2, 1].flatMap((n) => [result('Ana', 'Zip', n, 10), result('Luis', 'Zip', n, 20)]);
      expect(scoreGame(attempts, 'Ana', 'Luis', 'Zip').duels.map((d) => d.puzzleNum)).toEqual([1, 2, 10]);
    });
  });

  describe('bestTimesByPuzzle', () => {
    it('keeps the minimum per puzzle for one sender and game', () => {
      const best = bestTimesByPuzzle(
        [result('Ana', 'Zip', 1, 30), result('Ana', 'Zip', 1, 25), result('Ana', 'Tango', 1, 5), result('Luis', 'Zip', 1, 1)],
        'Ana',
        'Zip'
      );
      expect([...best]).toEqual([[1, 25]]);
    });
  });

  describe('tally helpers', () => {
    it('decides a duel on strict comparison', () => {
      expect(duelWinner(10, 11)).toBe('me');
      expect(duelWinner(11, 10)).toBe('contact');
      expect(duelWinner(10, 10)).toBe('tie');
    });

    it('reports played count and the leader', () => {
      expect(playedCount({ me: 2, contact: 1, tie: 3 })).toBe(6);
      expect(leaderOf({ me: 2, contact: 1, tie: 3 })).toBe('me');
      expect(leaderOf({ me: 0, contact: 1, tie: 0 })).toBe('contact');
      expect(leaderOf({ me: 1, contact: 1, tie: 5 })).toBe('tie');
    });
  });
});
