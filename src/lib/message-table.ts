import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import utc from 'dayjs/plugin/utc.js';
import * as v from 'valibot';
import { GAMES, MESSAGE_COLUMNS } from './games-constants';
import { findFirstResultToken } from './result-token';
import type { GameResult } from './game-result';

dayjs.extend(customParseFormat);
dayjs.extend(utc);

/** A row of the messages table, keyed by whatever the export calls its columns. */
export type MessageRow = Readonly<Record<string, unknown>>;

/** Which column holds each field. Matching is case-insensitive. */
export interface MessageColumns {
  sender: string;
  content: string;
  date: string;
}

const CellSchema = v.fallback(
  v.pipe(
    v.union([v.string(), v.number(), v.boolean()]),
    v.transform((value) => String(value))
  ),
  ''
);

/** Looks a column up by name, ignoring case. Missing or empty cells read as ''. */
export function readCell(row: MessageRow, column: string): string {
  const wanted = column.toUpperCase();
  const key = Object.keys(row).find((k) => k.toUpperCase() === wanted);
  if (key === undefined) return '';
  return v.parse(CellSchema, row[key]);
}

// Timestamp layouts seen in message exports. Times without a zone are UTC.
const DATE_FORMATS = [
  'YYYY-MM-DD',
  'YYYY-MM-DD HH:mm',
  'YYYY-MM-DD HH:mm:ss',
  'YYYY-MM-DD HH:mm:ss.SSS',
  'YYYY-MM-DD HH:mm:ss [UTC]',
  'YYYY-MM-DD[T]HH:mm',
  'YYYY-MM-DD[T]HH:mm:ss',
  'YYYY-MM-DD[T]HH:mm:ss.SSS',
  'MM/DD/YYYY',
  'MM/DD/YYYY HH:mm',
  'MM/DD/YYYY HH:mm:ss',
  'M/D/YYYY',
  'M/D/YYYY H:mm',
  'M/D/YYYY h:mm A',
  'MMM D, YYYY',
  'MMM D, YYYY HH:mm',
  'MMM D, YYYY h:mm A',
  'MMMM D, YYYY',
  'MMMM D, YYYY HH:mm',
  'MMMM D, YYYY h:mm A',
] as const;

// A clock time followed by Z, a numeric offset, or a UTC/GMT suffix.
const EXPLICIT_ZONE = /\d:\d{2}(?::\d{2}(?:\.\d+)?)?\s*(?:Z|[+-]\d{2}:?\d{2}|UTC|GMT)$/i;

/**
 * Parses an export timestamp into a UTC calendar date (YYYY-MM-DD).
 * Known layouts are read strictly as UTC, so out-of-range fields fail instead of
 * rolling over. Text with an explicit zone or offset is converted to UTC.
 * Returns null when the text is not a date.
 */
export function parseMessageDate(text: string): string | null {
  const trimmed = text.trim();
  if (!trimmed) return null;

  for (const format of DATE_FORMATS) {
    const parsed = dayjs.utc(trimmed, format, true);
    if (parsed.isValid()) return parsed.format('YYYY-MM-DD');
  }

  if (!EXPLICIT_ZONE.test(trimmed)) return null;
  const zoned = dayjs.utc(trimmed);
  return zoned.isValid() ? zoned.format('YYYY-MM-DD') : null;
}

/**
 * Extracts at most one game result per row: the first token in the content cell.
 * Rows without a token are skipped; a missing column reads as an empty cell.
 */
export function extractFromTable(
  rows: readonly MessageRow[],
  columns: MessageColumns = MESSAGE_COLUMNS,
  games: readonly string[] = GAMES
): GameResult[] {
  const results: GameResult[] = [];

  for (const row of rows) {
    const token = findFirstResultToken(readCell(row, columns.content), games);
    if (!token) continue;

    results.push({
      sender: readCell(row, columns.sender).trim(),
      date: parseMessageDate(readCell(row, columns.date)),
      game: token.game,
      puzzleNum: token.puzzleNum,
      timeSec: token.timeSec,
    });
  }

  return results;
}

/**
 * Guesses the exporting user's name: they take part in every conversation,
 * while each contact shows up in only one. Returns the sender seen in the most
 * distinct conversations, or null when the columns are absent or nothing was sent.
 */
export function detectMyNameFromTable(
  rows: readonly MessageRow[],
  senderColumn: string = MESSAGE_COLUMNS.sender,
  conversationColumn: string = MESSAGE_COLUMNS.conversation
): string | null {
  const conversationsBySender = new Map<string, Set<string>>();

  for (const row of rows) {
    const sender = readCell(row, senderColumn);
    const conversation = readCell(row, conversationColumn);
    if (!sender || !conversation) continue;

    const seen = conversationsBySender.get(sender) ?? new Set<string>();
    seen.add(conversation);
    conversationsBySender.set(sender, seen);
  }

  let best: string | null = null;
  let bestCount = 0;
  for (const sender of [...conversationsBySender.keys()].sort()) {
    const count = conversationsBySender.get(sender)?.size ?? 0;
    if (count > bestCount) {
      best = sender;
      bestCount = count;
    }
  }
  return best;
}
