import type { PlayerRecord } from "../types/player_record";
import { escapeHtml, layout } from "./html";

const errorBlock = (error?: string) =>
  error ? `<p class="error">${escapeHtml(error)}</p>\n` : "";

export const sortForReport = (players: PlayerRecord[]) =>
  [...players].sort(
    (a, b) => a.name.localeCompare(b.name) || a.character.localeCompare(b.character)
  );

function playerSelect(field: "winner" | "loser", players: PlayerRecord[], selected?: string): string {
  const options = players
    .map((p) => {
      const isSelected = selected !== undefined && p.name === selected ? " selected" : "";
      return `      <option value="${escapeHtml(p.name)}"${isSelected}>${escapeHtml(p.name)} (${escapeHtml(p.character)})</option>`;
    })
    .join("\n");
  const label = field === "winner" ? "Winner" : "Loser";

  return `  <label>${label}
    <select name="${field}" required>
      <option value="">Select a player</option>
${options}
    </select>
  </label>`;
}

export interface ReportFormState {
  winner?: string;
  loser?: string;
  error?: string;
}

export function renderReportForm(players: PlayerRecord[], state: ReportFormState = {}): string {
  const sorted = sortForReport(players);
  return layout(
    "Report a Match",
    `<h1>Report a Match</h1>
${errorBlock(state.error)}<form method="post" action="/smash/report">
${playerSelect("winner", sorted, state.winner)}
${playerSelect("loser", sorted, state.loser)}
  <button type="submit">Submit result</button>
</form>`
  );
}

export interface AddPlayerValues {
  name?: string;
  character?: string;
}

export function renderAddPlayerForm(values: AddPlayerValues = {}, error?: string): string {
  return layout(
    "Add Player",
    `<h1>Add Player</h1>
${errorBlock(error)}<form method="post" action="/smash/players">
  <label>Name <input name="name" value="${escapeHtml(values.name ?? "")}" required></label>
  <label>Character <input name="character" value="${escapeHtml(values.character ?? "")}" required></label>
  <button type="submit">Add to roster</button>
</form>`
  );
}
