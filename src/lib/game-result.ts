/** One puzzle result posted by one sender. */
export interface GameResult {
  readonly sender: string;
  /** Calendar date as YYYY-MM-DD, null when unknown (pasted chats carry none) */
  readonly date: string | null;
  readonly game: string;
  readonly puzzleNum: number;
  readonly timeSec: number;
}

export type ResultSet = readonly GameResult[];

export type DuelWinner = 'me' | 'contact' | 'tie';

export interface Duel {
  puzzleNum: number;
  myTime: number;
  contactTime: number;
  winner: DuelWinner;
}

export interface ScoreTally {
  me: number;
  contact: number;
  tie: number;
}

export interface GameScore extends ScoreTally {
  game: string;
  duels: Duel[];
}

export interface ScoreReport {
  /** One entry per game, in catalogue order */
  games: GameScore[];
  totals: ScoreTally;
}
