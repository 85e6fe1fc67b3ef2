import { GAME_ICONS } from './games-constants';
import { formatDuration } from './time-format';
import { firstName } from './utils';
import type { Duel, ResultSet } from './game-result';

/** Everyone except `me` who posted a result, alphabetically. */
export function listContacts(results: ResultSet, me: string): string[] {
  const senders = new Set(results.map((r) => r.sender));
  senders.delete(me);
  return [...senders].sort();
}

export function countByGame(results: ResultSet): Map<string, number> {
  const counts = new Map<string, number>();
  for (const { game } of results) {
    counts.set(game, (counts.get(game) ?? 0) + 1);
  }
  return counts;
}

/** Results per sender, skipping `exclude` (usually the user themselves). */
export function countBySender(results: ResultSet, exclude?: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const { sender } of results) {
    if (sender === exclude) continue;
    counts.set(sender, (counts.get(sender) ?? 0) + 1);
  }
  return counts;
}

/** Section heading for a game, prefixed with its icon when it has one. */
export function gameLabel(game: string): string {
  const icon = Object.entries(GAME_ICONS).find(([name]) => name === game)?.[1];
  return icon ? `${icon} ${game}` : game;
}

export interface DuelRow {
  puzzleNum: number;
  myTime: string;
  contactTime: string;
  winner: string;
}

// Match history table: times as m:ss, winner by first name
export function formatDuelRows(duels: readonly Duel[], me: string, contact: string): DuelRow[] {
  const labels = { me: firstName(me), contact: firstName(contact), tie: 'Tie' };
  return duels.map((duel) => ({
    puzzleNum: duel.puzzleNum,
    myTime: formatDuration(duel.myTime),
    contactTime: formatDuration(duel.contactTime),
    winner: labels[duel.winner],
  }));
}
