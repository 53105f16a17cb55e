import fs from "fs/promises";
import path from "path";
import { hasErrorCode } from "../utils/fs_errors";
import { CsvRecordStore, CSV_HEADER } from "./record_store";

/**
 * Creates the ratings file with just a header when it does not exist yet,
 * otherwise reads it once so a malformed file stops the server at startup.
 * Returns the number of players found.
 */
export async function initStore(store: CsvRecordStore): Promise<number> {
  console.log(`Initializing rating store at ${store.filePath}...`);

  await fs.mkdir(path.dirname(store.filePath), { recursive: true });
  try {
    await fs.writeFile(store.filePath, CSV_HEADER.join(",") + "\n", { flag: "wx" });
    console.log("Created empty rating store.");
    return 0;
  } catch (err) {
    if (!hasErrorCode(err, "EEXIST")) throw err;
  }

  const players = await store.readAll();
  console.log(`Rating store loaded: ${players.length} players.`);
  return players.length;
}
