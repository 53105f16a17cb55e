import type { PlayerRecord } from "../types/player_record";
import { renderErrorPage } from "./error_page";
import { renderAddPlayerForm, renderReportForm, sortForReport } from "./forms";
import { mediaUrl, renderGallery } from "./gallery";
import { escapeHtml } from "./html";
import { formatConfidence, rankPlayers, renderRankings } from "./rankings";

const players: PlayerRecord[] = [
  { name: "Kevin", character: "Luigi", rating: 1480.4, confidence: 0.15 },
  { name: "Abe", character: "Fox", rating: 1612.6, confidence: 0.5 },
  { name: "CPU1", character: "Kirby", rating: 1480.4, confidence: 1 },
];

describe("escapeHtml", () => {
  test("escapes markup characters", () => {
    expect(escapeHtml(`<b class="x">Tom & Jerry's</b>`)).toBe(
      "&lt;b class=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/b&gt;"
    );
  });
});

describe("rankings", () => {
  test("orders by rating, then name, and numbers the rows", () => {
    const ranked = rankPlayers(players);

    expect(ranked.map((p) => [p.rank, p.name])).toEqual([
      [1, "Abe"],
      [2, "CPU1"],
      [3, "Kevin"],
    ]);
    expect(ranked[1].color).toBe("#9E9E9E");
    expect(ranked[0].color).toBe("hsl(8, 75%, 60%)");
  });

  test("does not reorder the input", () => {
    rankPlayers(players);
    expect(players[0].name).toBe("Kevin");
  });

  test("shows rounded ratings and confidence as a percentage", () => {
    const html = renderRankings(players);

    expect(formatConfidence(0.15)).toBe("15%");
    expect(html).toContain(
      `<td style="color: hsl(8, 75%, 60%)">Abe</td>\n          <td>Fox</td>\n          <td>1613</td>\n          <td>50%</td>`
    );
    expect(html).toContain("<title>Smash Ranks</title>");
  });

  test("an empty roster says so", () => {
    expect(renderRankings([])).toContain(`<tr><td colspan="5">No players yet.</td></tr>`);
  });

  test("player names are escaped", () => {
    const html = renderRankings([{ name: "<script>", character: "Ness", rating: 1500, confidence: 0 }]);
    expect(html).toContain("&lt;script&gt;</td>");
    expect(html).not.toContain("<script>");
  });
});

describe("forms", () => {
  test("report form lists players by name then character", () => {
    expect(sortForReport(players).map((p) => p.name)).toEqual(["Abe", "CPU1", "Kevin"]);

    const html = renderReportForm(players);
    expect(html).toContain(`<option value="Abe">Abe (Fox)</option>`);
    expect(html).toContain(`<select name="winner" required>`);
    expect(html).toContain(`<select name="loser" required>`);
    expect(html).not.toContain(`class="error"`);
  });

  test("report form shows an error and keeps the submitted players selected", () => {
    const html = renderReportForm(players, { winner: "Kevin", loser: "Abe", error: "Pick two players" });

    expect(html).toContain(`<p class="error">Pick two players</p>`);
    expect(html).toContain(`<select name="winner" required>
      <option value="">Select a player</option>
      <option value="Abe">Abe (Fox)</option>
      <option value="CPU1">CPU1 (Kirby)</option>
      <option value="Kevin" selected>Kevin (Luigi)</option>`);
    expect(html).toContain(`<select name="loser" required>
      <option value="">Select a player</option>
      <option value="Abe" selected>Abe (Fox)</option>`);
  });

  test("add-player form keeps submitted values, escaped", () => {
    const html = renderAddPlayerForm({ name: `Jo "JT"`, character: "Sheik" });
    expect(html).toContain(`<input name="name" value="Jo &quot;JT&quot;" required>`);
    expect(html).toContain(`<input name="character" value="Sheik" required>`);
  });
});

describe("gallery", () => {
  test("links each video under /media", () => {
    expect(mediaUrl("best combo #1.mp4")).toBe("/media/best%20combo%20%231.mp4");
    expect(renderGallery(["clip.webm"])).toContain(
      `<video src="/media/clip.webm" controls preload="metadata"></video>\n  <figcaption>clip.webm</figcaption>`
    );
  });

  test("an empty gallery says so", () => {
    expect(renderGallery([])).toContain("<p>No videos yet.</p>");
  });
});

describe("error page", () => {
  test("shows code, message and description", () => {
    const html = renderErrorPage({ code: 404, message: "Page Not Found", description: "Gone." });
    expect(html).toContain("<title>404 Page Not Found</title>");
    expect(html).toContain("<h1>404: Page Not Found</h1>\n<p>Gone.</p>");
  });
});
