import { escapeHtml, layout } from "./html";

export const MEDIA_URL_PREFIX = "/media";

export const mediaUrl = (fileName: string) => `${MEDIA_URL_PREFIX}/${encodeURIComponent(fileName)}`;

export function renderGallery(files: string[]): string {
  const items =
    files
      .map(
        (file) => `<figure>
  <video src="${escapeHtml(mediaUrl(file))}" controls preload="metadata"></video>
  <figcaption>${escapeHtml(file)}</figcaption>
</figure>`
      )
      .join("\n") || "<p>No videos yet.</p>";

  return layout("Gallery", `<h1>Gallery</h1>\n${items}`);
}
