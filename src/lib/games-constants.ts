// The daily puzzle games we recognise in messages.
// Keep this list in one place: the result grammar, scoring and summaries all read it.
// "Mini Sudoku" must stay reachable before shorter labels; the grammar sorts by length.
export const GAMES = ['Tango', 'Queens', 'Zip', 'Mini Sudoku'] as const;

export type GameName = (typeof GAMES)[number];

export const GAME_ICONS: Record<GameName, string> = {
  'Tango': '🟡',
  'Queens': '👑',
  'Zip': '⚡',
  'Mini Sudoku': '🔢',
};

// Column names in the messages export (matched case-insensitively)
export const MESSAGE_COLUMNS = {
  sender: 'FROM',
  content: 'CONTENT',
  date: 'DATE',
  conversation: 'CONVERSATION ID',
} as const;

export const REQUIRED_MESSAGE_COLUMNS = [
  MESSAGE_COLUMNS.sender,
  MESSAGE_COLUMNS.content,
  MESSAGE_COLUMNS.date,
] as const;

// Upload limits in megabytes. Personal message exports are typically < 5 MB.
export const DEFAULT_CSV_SIZE_LIMIT_MB = 50;
export const DEFAULT_TXT_SIZE_LIMIT_MB = 2;
