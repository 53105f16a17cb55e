export interface PlayerRecord {
  name: string;
  character: string;
  rating: number;
  confidence: number;
}

export interface MatchResult {
  winner: PlayerRecord;
  loser: PlayerRecord;
  winnerDelta: number;
  loserDelta: number;
}

// What the rankings page shows for one row
export interface RankedPlayer extends PlayerRecord {
  rank: number;
  color: string;
}
