import { GAMES } from '~/lib/games-constants';
import { detectMyNameFromTable, extractFromTable } from '~/lib/message-table';
import { readMessagesCsv } from '~/lib/messages-csv';
import { mergeResults } from '~/lib/result-merger';
import { computeScores } from '~/lib/head-to-head';
import { countByGame, listContacts } from '~/lib/result-summary';
import { detectSpeakers, extractFromTranscript } from '~/lib/transcript-parser';
import type { TrackerEnv } from '~/lib/env.app';
import type { GameResult, ResultSet, ScoreReport } from '~/lib/game-result';

/**
 * State the caller keeps between submissions. Every transition below returns a new
 * state; nothing here is stored globally.
 */
export interface TrackerState {
  readonly myName: string | null;
  /** Results added from pasted conversations, in the order they were added */
  readonly manualResults: ResultSet;
}

export function createTrackerState(): TrackerState {
  return { myName: null, manualResults: [] };
}

export function chooseIdentity(state: TrackerState, myName: string): TrackerState {
  return { ...state, myName };
}

/** Forget who the user is; their pasted results go too. */
export function resetIdentity(): TrackerState {
  return createTrackerState();
}

export function clearManualResults(state: TrackerState): TrackerState {
  return { ...state, manualResults: [] };
}

export interface LoadedCsv {
  state: TrackerState;
  /** Results read from the export. Not accumulated: pass them to buildComparison. */
  csvResults: GameResult[];
}

/** Reads a messages export, picking up the user's name if it is not known yet. */
export function loadMessagesCsv(
  state: TrackerState,
  csvText: string,
  limits?: Pick<TrackerEnv, 'CSV_SIZE_LIMIT_MB'>
): LoadedCsv {
  const { rows } = readMessagesCsv(csvText, limits);

  let next = state;
  if (next.myName === null) {
    const detected = detectMyNameFromTable(rows);
    if (detected) next = chooseIdentity(next, detected);
  }

  const csvResults = extractFromTable(rows);
  console.log(`Loaded ${csvResults.length} game results from CSV`);
  return { state: next, csvResults };
}

export type ConversationOutcome =
  | { kind: 'no-speakers' }
  | { kind: 'identity-needed'; speakers: string[] }
  | { kind: 'contact-missing'; myName: string }
  | { kind: 'no-results'; myName: string; contact: string }
  | {
      kind: 'added';
      myName: string;
      contact: string;
      records: GameResult[];
      myCount: number;
      contactCount: number;
    };

export interface ConversationUpdate {
  state: TrackerState;
  outcome: ConversationOutcome;
}

/**
 * Adds the results from one pasted conversation. The contact is the first header
 * name that is not the user; if the user is unknown, the first two speakers are
 * offered as candidates and nothing is added.
 */
export function addConversation(state: TrackerState, text: string): ConversationUpdate {
  const speakers = detectSpeakers(text);
  if (speakers.length === 0) {
    return { state, outcome: { kind: 'no-speakers' } };
  }

  const { myName } = state;
  if (myName === null) {
    return { state, outcome: { kind: 'identity-needed', speakers: speakers.slice(0, 2) } };
  }

  const contact = speakers.find((speaker) => speaker !== myName);
  if (contact === undefined) {
    return { state, outcome: { kind: 'contact-missing', myName } };
  }

  const { records } = extractFromTranscript(text, myName, contact);
  if (records.length === 0) {
    return { state, outcome: { kind: 'no-results', myName, contact } };
  }

  const myCount = records.filter((r) => r.sender === myName).length;
  return {
    state: { ...state, manualResults: [...state.manualResults, ...records] },
    outcome: {
      kind: 'added',
      myName,
      contact,
      records,
      myCount,
      contactCount: records.length - myCount,
    },
  };
}

export interface ResultsOverview {
  csvCount: number;
  manualCount: number;
  total: number;
  contactCount: number;
  byGame: Map<string, number>;
}

export type Comparison =
  | { kind: 'identity-unknown' }
  | { kind: 'no-results' }
  | { kind: 'me-missing'; myName: string }
  | { kind: 'no-contacts'; myName: string }
  | {
      kind: 'ready';
      myName: string;
      contact: string;
      contacts: string[];
      results: ResultSet;
      overview: ResultsOverview;
      report: ScoreReport;
    };

/**
 * Merges the export with pasted results and scores the user against `contact`
 * (or the first contact alphabetically when none is given or it is unknown).
 */
export function buildComparison(
  state: TrackerState,
  csvResults: ResultSet,
  contact?: string,
  games: readonly string[] = GAMES
): Comparison {
  const { myName } = state;
  if (myName === null) return { kind: 'identity-unknown' };

  const results = mergeResults(csvResults, state.manualResults);
  if (results.length === 0) return { kind: 'no-results' };

  if (!results.some((r) => r.sender === myName)) {
    return { kind: 'me-missing', myName };
  }

  const contacts = listContacts(results, myName);
  if (contacts.length === 0) return { kind: 'no-contacts', myName };

  const selected = contact !== undefined && contacts.includes(contact) ? contact : contacts[0];

  return {
    kind: 'ready',
    myName,
    contact: selected,
    contacts,
    results,
    overview: {
      csvCount: csvResults.length,
      manualCount: state.manualResults.length,
      total: results.length,
      contactCount: contacts.length,
      byGame: countByGame(results),
    },
    report: computeScores(results, myName, selected, games),
  };
}
