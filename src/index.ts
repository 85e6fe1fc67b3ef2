export { GAMES, GAME_ICONS, MESSAGE_COLUMNS, REQUIRED_MESSAGE_COLUMNS } from '~/lib/games-constants';
export type { GameName } from '~/lib/games-constants';
export type { GameResult, ResultSet, Duel, DuelWinner, GameScore, ScoreReport, ScoreTally } from '~/lib/game-result';

// Extraction
export { buildResultPattern, scanResultTokens, findFirstResultToken, canonicalGameName, toSeconds } from '~/lib/result-token';
export type { ResultToken } from '~/lib/result-token';
export { extractFromTable, parseMessageDate, readCell, detectMyNameFromTable } from '~/lib/message-table';
export type { MessageRow, MessageColumns } from '~/lib/message-table';
export { extractFromTranscript, findSpeakerMarkers, speakerBefore, detectSpeakers } from '~/lib/transcript-parser';
export type { SpeakerMarker, TranscriptExtraction } from '~/lib/transcript-parser';
export { readMessagesCsv, decodeTranscript, missingMessageColumns, MessagesCsvError, InputTooLargeError } from '~/lib/messages-csv';
export type { MessagesCsv } from '~/lib/messages-csv';

// Merge and score
export { mergeResults } from '~/lib/result-merger';
export { computeScores, scoreGame, bestTimesByPuzzle, duelWinner, tallyTotals, getGameScore, playedCount, leaderOf } from '~/lib/head-to-head';
export { listContacts, countByGame, countBySender, formatDuelRows, gameLabel } from '~/lib/result-summary';
export type { DuelRow } from '~/lib/result-summary';
export { formatDuration } from '~/lib/time-format';
export { safeMarkdown, firstName } from '~/lib/utils';

// Caller-held session
export {
  createTrackerState,
  chooseIdentity,
  resetIdentity,
  clearManualResults,
  loadMessagesCsv,
  addConversation,
  buildComparison,
} from '~/lib/tracker-session';
export type { TrackerState, LoadedCsv, ConversationOutcome, ConversationUpdate, ResultsOverview, Comparison } from '~/lib/tracker-session';

export { loadTrackerEnv, trackerEnv } from '~/lib/env.app';
export type { TrackerEnv } from '~/lib/env.app';
