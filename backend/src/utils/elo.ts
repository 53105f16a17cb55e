// src/utils/elo.ts
export const DEFAULT_RATING = 1500;
export const DEFAULT_CONFIDENCE = 0;
export const CONFIDENCE_CEILING = 1;
export const CONFIDENCE_GAIN = 0.15;

// K for a brand new player and for a fully settled one
export const K_PROVISIONAL = 64;
export const K_STABLE = 16;

export type MatchScore = 0 | 1;

export interface RatingState {
  rating: number;
  confidence: number;
}

export const expectedScore = (rating: number, opponentRating: number) =>
  1 / (1 + Math.pow(10, (opponentRating - rating) / 400));

/**
 * K shrinks linearly from K_PROVISIONAL at zero confidence to K_STABLE at the ceiling.
 * With confidence growing by a fixed share of the remaining gap per match, K after
 * n matches is K_STABLE + (K_PROVISIONAL - K_STABLE) * (1 - CONFIDENCE_GAIN)^n.
 */
export function kFactor(confidence: number): number {
  const c = Math.min(Math.max(confidence, 0), CONFIDENCE_CEILING);
  return K_PROVISIONAL - (K_PROVISIONAL - K_STABLE) * (c / CONFIDENCE_CEILING);
}

export const nextConfidence = (confidence: number) =>
  Math.min(CONFIDENCE_CEILING, confidence + (CONFIDENCE_CEILING - confidence) * CONFIDENCE_GAIN);

// Both sides must be rated from the pre-match state of both players.
export function newRating(self: RatingState, opponent: RatingState, score: MatchScore): RatingState {
  const expected = expectedScore(self.rating, opponent.rating);
  const rating = Math.max(0, self.rating + kFactor(self.confidence) * (score - expected));
  return { rating, confidence: nextConfidence(self.confidence) };
}
