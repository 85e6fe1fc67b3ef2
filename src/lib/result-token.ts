import { GAMES } from './games-constants';
import { escapeRegExp } from './utils';

/**
 * A game-result substring found in free text, e.g.
 *   "Tango n.º 240 | 0:46"   "Mini Sudoku n.º 193 | 1:41"   "Zip #78 | 0:13"
 */
export interface ResultToken {
  /** Label as written in the text */
  label: string;
  /** Label in catalogue casing */
  game: string;
  puzzleText: string;
  minutesText: string;
  secondsText: string;
  puzzleNum: number;
  timeSec: number;
  /** Offset of the first character of the token in the scanned text */
  offset: number;
}

const patternCache = new Map<string, RegExp>();

/**
 * Builds the result-token pattern for a game catalogue.
 * Longer labels are tried first so "Mini Sudoku" never loses to a shorter label.
 */
export function buildResultPattern(games: readonly string[] = GAMES): RegExp {
  const cacheKey = games.join('\n');
  const cached = patternCache.get(cacheKey);
  if (cached) return cached;

  const labels = [...games]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|');

  // <game> <n.º | nº | #> <digits> | <minutes>:<seconds>
  const pattern = new RegExp(
    `(${labels})` +
    '\\s+(?:n\\.?[ºª°]|#)\\s*(\\d+)' +
    '\\s*\\|\\s*(\\d+):(\\d+)',
    'gi'
  );
  patternCache.set(cacheKey, pattern);
  return pattern;
}

export function toSeconds(minutes: string, seconds: string): number {
  return parseInt(minutes, 10) * 60 + parseInt(seconds, 10);
}

/** Catalogue casing for a matched label; the raw label if it is not in the catalogue. */
export function canonicalGameName(label: string, games: readonly string[] = GAMES): string {
  const lower = label.toLowerCase();
  return games.find((game) => game.toLowerCase() === lower) ?? label;
}

/**
 * Lazily yields every result token in `text`, left to right.
 * Each call starts a fresh scan, so the sequence can be restarted freely.
 */
export function* scanResultTokens(
  text: string,
  games: readonly string[] = GAMES
): Generator<ResultToken> {
  for (const match of text.matchAll(buildResultPattern(games))) {
    const [, label, puzzleText, minutesText, secondsText] = match;
    yield {
      label,
      game: canonicalGameName(label, games),
      puzzleText,
      minutesText,
      secondsText,
      puzzleNum: parseInt(puzzleText, 10),
      timeSec: toSeconds(minutesText, secondsText),
      offset: match.index ?? 0,
    };
  }
}

/** First result token anywhere in `text`, or null. */
export function findFirstResultToken(
  text: string,
  games: readonly string[] = GAMES
): ResultToken | null {
  for (const token of scanResultTokens(text, games)) {
    return token;
  }
  return null;
}
