import type { MatchResult, PlayerRecord } from "../types/player_record";
import type { RecordStore } from "../database/record_store";
import { sameName } from "../database/record_store";
import {
  DuplicatePlayerError,
  InvalidMatchError,
  InvalidPlayerError,
  UnknownPlayerError,
} from "../types/errors";
import { DEFAULT_CONFIDENCE, DEFAULT_RATING, newRating } from "./elo";
import { UpdateLock } from "./update_lock";

const LINE_BREAK = /[\r\n]/;

export class RatingEngine {
  constructor(
    private readonly store: RecordStore,
    private readonly lock: UpdateLock = new UpdateLock()
  ) {}

  listPlayers(): Promise<PlayerRecord[]> {
    return this.store.readAll();
  }

  async applyResult(winnerName: string, loserName: string): Promise<MatchResult> {
    const winnerKey = winnerName.trim();
    const loserKey = loserName.trim();
    if (!winnerKey || !loserKey) {
      throw new InvalidMatchError("Both a winner and a loser must be selected.");
    }
    if (sameName(winnerKey, loserKey)) {
      throw new InvalidMatchError("A player cannot play against themselves.");
    }

    return this.lock.run(async () => {
      const players = await this.store.readAll();

      const winner = players.find((p) => sameName(p.name, winnerKey));
      if (!winner) throw new UnknownPlayerError(winnerKey);
      const loser = players.find((p) => sameName(p.name, loserKey));
      if (!loser) throw new UnknownPlayerError(loserKey);

      const updatedWinner = { ...winner, ...newRating(winner, loser, 1) };
      const updatedLoser = { ...loser, ...newRating(loser, winner, 0) };

      await this.store.writeAll(
        players.map((p) => (p === winner ? updatedWinner : p === loser ? updatedLoser : p))
      );

      const result: MatchResult = {
        winner: updatedWinner,
        loser: updatedLoser,
        winnerDelta: updatedWinner.rating - winner.rating,
        loserDelta: updatedLoser.rating - loser.rating,
      };
      console.log(
        `Match recorded: ${winner.name} (${result.winnerDelta.toFixed(1)}) beat ` +
          `${loser.name} (${result.loserDelta.toFixed(1)})`
      );
      return result;
    });
  }

  async addPlayer(name: string, character: string): Promise<PlayerRecord> {
    const trimmedName = name.trim();
    const trimmedCharacter = character.trim();
    if (!trimmedName || !trimmedCharacter) {
      throw new InvalidPlayerError("Player name and character cannot be empty.");
    }
    if (LINE_BREAK.test(trimmedName) || LINE_BREAK.test(trimmedCharacter)) {
      throw new InvalidPlayerError("Player name and character must fit on one line.");
    }

    return this.lock.run(async () => {
      const players = await this.store.readAll();
      if (players.some((p) => sameName(p.name, trimmedName))) {
        throw new DuplicatePlayerError(trimmedName);
      }

      const player: PlayerRecord = {
        name: trimmedName,
        character: trimmedCharacter,
        rating: DEFAULT_RATING,
        confidence: DEFAULT_CONFIDENCE,
      };
      await this.store.writeAll([...players, player]);

      console.log(`Added ${player.name} (${player.character}) to the roster.`);
      return player;
    });
  }
}
