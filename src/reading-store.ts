import fs from "node:fs/promises";
import path from "node:path";
import { HistoryCorruptError, StorageError, describeError } from "./errors.js";
import { HistorySchema } from "./reading.schema.js";
import type { HistoryStore, Reading } from "./types.js";
import { ensureOutputDir, isMissingFileError } from "./utils.js";

export const HISTORY_LIMIT = 100;

/** Keeps the most recent `limit` readings, oldest first. */
export function trimHistory(history: Reading[], limit: number = HISTORY_LIMIT): Reading[] {
  return history.length > limit ? history.slice(-limit) : history;
}

/**
 * Whole-file JSON history. Every append is a full load, push, trim and
 * rewrite; there is no locking, so only one process may use a file.
 */
export class ReadingStore implements HistoryStore {
  constructor(
    readonly filePath: string,
    private readonly limit: number = HISTORY_LIMIT
  ) {}

  async load(): Promise<Reading[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isMissingFileError(error)) {
        return [];
      }
      throw new StorageError(
        `Unable to read ${this.filePath}: ${describeError(error)}`,
        this.filePath,
        { cause: error }
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new HistoryCorruptError(this.filePath, "not valid JSON", { cause: error });
    }

    const result = HistorySchema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
      throw new HistoryCorruptError(
        this.filePath,
        `${issue?.message ?? "unexpected shape"}${where}`,
        { cause: result.error }
      );
    }
    return result.data;
  }

  async append(reading: Reading): Promise<void> {
    await this.appendAll([reading]);
  }

  async appendAll(readings: readonly Reading[]): Promise<Reading[]> {
    const history = await this.load();
    history.push(...readings);
    const trimmed = trimHistory(history, this.limit);
    await this.save(trimmed);
    return trimmed;
  }

  async save(history: readonly Reading[]): Promise<void> {
    const tmpPath = `${this.filePath}.tmp`;
    try {
      await ensureOutputDir(path.dirname(this.filePath));
      await fs.writeFile(tmpPath, JSON.stringify(history, null, 2));
      await fs.rename(tmpPath, this.filePath);
    } catch (error) {
      await fs.rm(tmpPath, { force: true });
      throw new StorageError(
        `Unable to write ${this.filePath}: ${describeError(error)}`,
        this.filePath,
        { cause: error }
      );
    }
  }
}
