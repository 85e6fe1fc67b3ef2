import { describe, it, expect } from 'vitest';
import { countByGame, countBySender, formatDuelRows, gameLabel, listContacts } from './result-summary';
import type { GameResult } from './game-result';

const result = (sender: string, game: string, puzzleNum: number, timeSec: number): GameResult => ({
  sender,
  date: null,
  game,
  puzzleNum,
  timeSec,
});

describe('result-summary', () => {
  const results = [
    result('Me Myself', 'Zip', 1, 10),
    result('Luis Gil', 'Zip', 1, 12),
    result('Ana Ruiz', 'Tango', 4, 50),
    result('Luis Gil', 'Tango', 4, 55),
  ];

  it('lists contacts alphabetically without the user', () => {
    expect(listContacts(results, 'Me Myself')).toEqual(['Ana Ruiz', 'Luis Gil']);
    expect(listContacts([], 'Me Myself')).toEqual([]);
  });

  it('counts results per game and per sender', () => {
    expect(Object.fromEntries(countByGame(results))).toEqual({ Zip: 2, Tango: 2 });
    expect(Object.fromEntries(countBySender(results, 'Me Myself'))).toEqual({ 'Luis Gil': 2, 'Ana Ruiz': 1 });
    expect(countBySender(results).get('Me Myself')).toBe(1);
  });

  it('formats duel rows with times and first-name winners', () => {
    const rows = formatDuelRows(
      [
        { puzzleNum: 3, myTime: 125, contactTime: 20, winner: 'contact' },
        { puzzleNum: 9, myTime: 30, contactTime: 30, winner: 'tie' },
        { puzzleNum: 11, myTime: 5, contactTime: 61, winner: 'me' },
      ],
      'Me Myself',
      'Luis Gil'
    );

    expect(rows).toEqual([
      { puzzleNum: 3, myTime: '2:05', contactTime: '0:20', winner: 'Luis' },
      { puzzleNum: 9, myTime: '0:30', contactTime: '0:30', winner: 'Tie' },
      { puzzleNum: 11, myTime: '0:05', contactTime: '1:01', winner: 'Me' },
    ]);
  });

  describe('gameLabel', () => {
    it('prefixes catalogue games with their icon', () => {
      expect(gameLabel('Queens')).toBe('👑 Queens');
      expect(gameLabel('Mini Sudoku')).toBe('🔢 Mini Sudoku');
      expect(gameLabel('Crossclimb')).toBe('Crossclimb');
    });
  });
});
