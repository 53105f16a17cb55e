import type { Dirent } from "fs";
import fs from "fs/promises";
import path from "path";
import { hasErrorCode } from "./fs_errors";

export const VIDEO_EXTENSIONS = new Set([".mp4", ".webm", ".mov", ".m4v", ".ogv", ".mkv"]);

export const isVideoFile = (fileName: string) =>
  VIDEO_EXTENSIONS.has(path.extname(fileName).toLowerCase());

export async function listMedia(dir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) {
      console.warn(`Media directory ${dir} does not exist, gallery is empty.`);
      return [];
    }
    throw err;
  }

  return entries
    // Dotfiles are never served under /media
    .filter((entry) => entry.isFile() && !entry.name.startsWith(".") && isVideoFile(entry.name))
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b));
}
