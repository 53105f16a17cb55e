import { escapeHtml, layout } from "./html";

export interface ErrorPageContext {
  code: number;
  message: string;
  description: string;
}

export function renderErrorPage({ code, message, description }: ErrorPageContext): string {
  return layout(
    `${code} ${message}`,
    `<h1>${code}: ${escapeHtml(message)}</h1>
<p>${escapeHtml(description)}</p>
<p><a href="/home">Back to the hub</a></p>`
  );
}
