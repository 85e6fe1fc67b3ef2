import { GAMES } from './games-constants';
import { scanResultTokens } from './result-token';
import { escapeRegExp } from './utils';
import type { GameResult } from './game-result';

/** A message header found in a pasted conversation. */
export interface SpeakerMarker {
  position: number;
  speakerName: string;
}

export interface TranscriptExtraction {
  records: GameResult[];
  /** False when neither name opens any line, i.e. the names are probably wrong */
  namesDetected: boolean;
}

// Header lines look like "Full Name   8:41": the name, two or more spaces, then the time.
// "Name sent a message at 8:41" has a single space before the time and is not a header.
const HEADER_LINE = /^(.+?)\s{2,}\d{1,2}:\d{2}\s*$/gm;

/** Unique header names in the order they first appear. */
export function detectSpeakers(text: string): string[] {
  const names: string[] = [];
  for (const match of text.matchAll(HEADER_LINE)) {
    const name = match[1].trim();
    if (name && !names.includes(name)) names.push(name);
  }
  return names;
}

/**
 * Every line that starts with one of `names` (any case) followed by whitespace.
 * Sorted by position; at a shared position the longer name sorts last so it wins
 * attribution over a name that is its prefix.
 */
export function findSpeakerMarkers(text: string, names: readonly string[]): SpeakerMarker[] {
  const markers: SpeakerMarker[] = [];

  for (const name of names) {
    if (!name) continue;
    const lineStart = new RegExp(`^${escapeRegExp(name)}\\s`, 'gim');
    for (const match of text.matchAll(lineStart)) {
      markers.push({ position: match.index ?? 0, speakerName: name });
    }
  }

  return markers.sort((a, b) =>
    a.position - b.position ||
    a.speakerName.length - b.speakerName.length ||
    (a.speakerName < b.speakerName ? -1 : a.speakerName > b.speakerName ? 1 : 0)
  );
}

/** Speaker of the last marker strictly before `offset`, or null. */
export function speakerBefore(markers: readonly SpeakerMarker[], offset: number): string | null {
  let lo = 0;
  let hi = markers.length;
  // first index whose position >= offset
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (markers[mid].position < offset) lo = mid + 1;
    else hi = mid;
  }
  return lo > 0 ? markers[lo - 1].speakerName : null;
}

/**
 * Parses a copied conversation. Each game result is credited to whichever of the
 * two participants has the nearest header above it; results above the first
 * header are dropped.
 */
export function extractFromTranscript(
  text: string,
  nameA: string,
  nameB: string,
  games: readonly string[] = GAMES
): TranscriptExtraction {
  const markers = findSpeakerMarkers(text, [nameA, nameB]);
  const records: GameResult[] = [];

  for (const token of scanResultTokens(text, games)) {
    const sender = speakerBefore(markers, token.offset);
    if (!sender) continue;

    records.push({
      sender,
      date: null,
      game: token.game,
      puzzleNum: token.puzzleNum,
      timeSec: token.timeSec,
    });
  }

  return { records, namesDetected: markers.length > 0 };
}
