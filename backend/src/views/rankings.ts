import type { PlayerRecord, RankedPlayer } from "../types/player_record";
import { getColorForName } from "../utils/player_color";
import { escapeHtml, layout } from "./html";

export function rankPlayers(players: PlayerRecord[]): RankedPlayer[] {
  return [...players]
    .sort((a, b) => b.rating - a.rating || a.name.localeCompare(b.name))
    .map((player, i) => ({ ...player, rank: i + 1, color: getColorForName(player.name) }));
}

export const formatConfidence = (confidence: number) => `${Math.round(confidence * 100)}%`;

export function renderRankings(players: PlayerRecord[]): string {
  const ranked = rankPlayers(players);

  const rows =
    ranked
      .map(
        (p) => `        <tr>
          <td>${p.rank}</td>
          <td style="color: ${escapeHtml(p.color)}">${escapeHtml(p.name)}</td>
          <td>${escapeHtml(p.character)}</td>
          <td>${Math.round(p.rating)}</td>
          <td>${formatConfidence(p.confidence)}</td>
        </tr>`
      )
      .join("\n") || `        <tr><td colspan="5">No players yet.</td></tr>`;

  return layout(
    "Smash Ranks",
    `<h1>Smash Ranks</h1>
<table>
  <thead>
    <tr><th>#</th><th>Player</th><th>Character</th><th>Rating</th><th>Confidence</th></tr>
  </thead>
  <tbody>
${rows}
  </tbody>
</table>`
  );
}
