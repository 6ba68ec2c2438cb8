import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import { log } from "../logger.js";
import { KeyedMutex } from "../agent/keyed-mutex.js";
import { StoreUnavailableError, describeError } from "../errors.js";
import { longTermRecordSchema, type LongTermRecord } from "./types.js";

// ── Durable Store: Long-term Memory (LM) ────────────────

export interface DurableStore {
  /** All records for a user, oldest first. Empty when the user is unknown. */
  readRecords(userId: string): Promise<LongTermRecord[]>;
  appendRecord(userId: string, record: LongTermRecord): Promise<void>;
}

const recordFileSchema = z.array(longTermRecordSchema);

/**
 * One JSON file per user under `directory`. Writes to the same file are
 * chained so two appends never read-modify-write over each other, and each
 * write lands in a temp file that is renamed over the target.
 */
export class JsonFileDurableStore implements DurableStore {
  private readonly directory: string;
  private readonly fileLocks = new KeyedMutex();
  private dirReady = false;

  constructor(directory: string) {
    this.directory = path.resolve(directory);
  }

  async readRecords(userId: string): Promise<LongTermRecord[]> {
    const filePath = this.filePath(userId);
    const records = await this.loadFile(filePath);
    log.debug({ userId, count: records.length }, "📂 LM loaded");
    return records;
  }

  async appendRecord(userId: string, record: LongTermRecord): Promise<void> {
    const filePath = this.filePath(userId);
    await this.fileLocks.run(filePath, async () => {
      const records = await this.loadFile(filePath);
      records.push({ ...record, userId });
      await this.saveFile(filePath, records);
    });
    log.debug({ userId, eventType: record.eventType }, "💾 LM record appended");
  }

  // ── File helpers ───────────────────────────────────────

  private filePath(userId: string): string {
    if (!userId.trim()) {
      throw new StoreUnavailableError("durable", "Empty user id");
    }
    const resolved = path.resolve(this.directory, `${userId}.json`);
    if (path.dirname(resolved) !== this.directory) {
      throw new StoreUnavailableError(
        "durable",
        `Invalid user id "${userId}": path traversal detected`,
      );
    }
    return resolved;
  }

  private async loadFile(filePath: string): Promise<LongTermRecord[]> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return [];
      throw new StoreUnavailableError(
        "durable",
        `Failed to read ${path.basename(filePath)}: ${describeError(err)}`,
        err,
      );
    }

    try {
      return recordFileSchema.parse(JSON.parse(raw));
    } catch (err) {
      throw new StoreUnavailableError(
        "durable",
        `Corrupt record file ${path.basename(filePath)}`,
        err,
      );
    }
  }

  private async saveFile(
    filePath: string,
    records: LongTermRecord[],
  ): Promise<void> {
    try {
      if (!this.dirReady) {
        await fs.mkdir(this.directory, { recursive: true });
        this.dirReady = true;
      }
      const tmpPath = `${filePath}.tmp`;
      await fs.writeFile(tmpPath, JSON.stringify(records, null, 2), "utf-8");
      await fs.rename(tmpPath, filePath);
    } catch (err) {
      throw new StoreUnavailableError(
        "durable",
        `Failed to write ${path.basename(filePath)}: ${describeError(err)}`,
        err,
      );
    }
  }
}

function isNotFound(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}
