import { layout } from "./html";

export function renderHome(): string {
  return layout(
    "Home",
    `<h1>Welcome to the hub</h1>
<p>Check the <a href="/smash">Smash rankings</a>, <a href="/smash/report">report a match</a> or watch some clips in the <a href="/gallery">gallery</a>.</p>`
  );
}
