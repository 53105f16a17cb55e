import fs from "fs/promises";
import path from "path";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type { PlayerRecord } from "../types/player_record";
import { StorageReadError, StorageWriteError } from "../types/errors";
import { CONFIDENCE_CEILING } from "../utils/elo";
import { encodeRow, parseCsv } from "./csv";

export const CSV_HEADER = ["Name", "Character", "Rating", "Confidence"] as const;

export interface RecordStore {
  readAll(): Promise<PlayerRecord[]>;
  /** Replaces the whole persisted record set. */
  writeAll(records: PlayerRecord[]): Promise<void>;
}

const numberField = z
  .string()
  .trim()
  .min(1, "is empty")
  .transform(Number)
  .pipe(z.number().finite().nonnegative());

const PlayerRowSchema = z.object({
  name: z.string().trim().min(1, "Name is empty"),
  character: z.string().trim().min(1, "Character is empty"),
  rating: numberField,
  confidence: numberField.pipe(z.number().max(CONFIDENCE_CEILING)),
});

export const sameName = (a: string, b: string) =>
  a.trim().toLowerCase() === b.trim().toLowerCase();

export function parseRecords(text: string, source: string): PlayerRecord[] {
  const rows = parseCsv(text);
  if (!rows) throw new StorageReadError(`${source}: unterminated quoted field`);
  if (rows.length === 0) throw new StorageReadError(`${source}: missing header`);

  const [header, ...body] = rows;
  if (header.join(",") !== CSV_HEADER.join(",")) {
    throw new StorageReadError(
      `${source}: expected header '${CSV_HEADER.join(",")}', found '${header.join(",")}'`
    );
  }

  const records: PlayerRecord[] = [];
  body.forEach((fields, i) => {
    // +2: one for the header, one for 1-based numbering
    const line = i + 2;
    if (fields.length !== CSV_HEADER.length) {
      throw new StorageReadError(
        `${source}:${line}: expected ${CSV_HEADER.length} columns, found ${fields.length}`
      );
    }

    const [name, character, rating, confidence] = fields;
    const parsed = PlayerRowSchema.safeParse({ name, character, rating, confidence });
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new StorageReadError(`${source}:${line}: ${issue.path.join(".")} ${issue.message}`);
    }

    if (records.some((r) => sameName(r.name, parsed.data.name))) {
      throw new StorageReadError(`${source}:${line}: duplicate player '${parsed.data.name}'`);
    }
    records.push(parsed.data);
  });

  return records;
}

export function serializeRecords(records: PlayerRecord[]): string {
  const lines = [
    encodeRow([...CSV_HEADER]),
    ...records.map((r) =>
      encodeRow([r.name, r.character, String(r.rating), String(r.confidence)])
    ),
  ];
  return lines.join("\n") + "\n";
}

export class CsvRecordStore implements RecordStore {
  constructor(public readonly filePath: string) {}

  async readAll(): Promise<PlayerRecord[]> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, "utf-8");
    } catch (err) {
      throw new StorageReadError(`Could not read ${this.filePath}`, { cause: err });
    }
    return parseRecords(text, this.filePath);
  }

  async writeAll(records: PlayerRecord[]): Promise<void> {
    const tempPath = path.join(
      path.dirname(this.filePath),
      `.${path.basename(this.filePath)}.${uuidv4()}.tmp`
    );

    try {
      await fs.writeFile(tempPath, serializeRecords(records), "utf-8");
      await fs.rename(tempPath, this.filePath);
    } catch (err) {
      await fs.rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
        console.warn(`Could not remove temp file ${tempPath}:`, cleanupErr);
      });
      throw new StorageWriteError(`Could not write ${this.filePath}`, { cause: err });
    }
  }
}
