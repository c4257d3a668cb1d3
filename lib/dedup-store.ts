/**
 * Dedup Store
 *
 * Remembers which personal-feed events already became Todoist tasks. Two
 * backends implement the same interface: a line file (this module) and a
 * libsql/SQLite table (dedup-db.ts). The deployment picks one in
 * config/sync.json.
 */

import * as fs from "fs";
import * as path from "path";
import { StoreError, describeError } from "./sync-errors.js";

// ============================================================================
// Types
// ============================================================================

export interface DedupStore {
  hasBeenSynced(id: string): Promise<boolean>;
  /**
   * Insert-if-absent. Resolves true when the identifier was newly recorded.
   */
  markSynced(id: string): Promise<boolean>;
  close(): Promise<void>;
}

// ============================================================================
// File backend
// ============================================================================

/**
 * Parse one line of the tracking file.
 * Lines are JSON strings; anything else is a bare identifier from an older file.
 */
function parseLine(line: string): string {
  if (!line.startsWith('"')) {
    return line;
  }
  try {
    const parsed: unknown = JSON.parse(line);
    return typeof parsed === "string" ? parsed : line;
  } catch {
    return line;
  }
}

export class FileDedupStore implements DedupStore {
  private constructor(
    readonly filePath: string,
    private readonly ids: Set<string>
  ) {}

  /**
   * Load the tracking file. A missing file is an empty store.
   */
  static async open(filePath: string): Promise<FileDedupStore> {
    const ids = new Set<string>();
    let content: string;
    try {
      if (!fs.existsSync(filePath)) {
        return new FileDedupStore(filePath, ids);
      }
      content = fs.readFileSync(filePath, "utf-8");
    } catch (error) {
      throw new StoreError("open", `Cannot read ${filePath}: ${describeError(error)}`, {
        cause: error,
      });
    }

    for (const rawLine of content.split("\n")) {
      const line = rawLine.trim();
      if (line) {
        ids.add(parseLine(line));
      }
    }
    return new FileDedupStore(filePath, ids);
  }

  async hasBeenSynced(id: string): Promise<boolean> {
    return this.ids.has(id);
  }

  async markSynced(id: string): Promise<boolean> {
    if (this.ids.has(id)) {
      return false;
    }

    try {
      const dir = path.dirname(this.filePath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
      // One appended line per identifier, written in a single call
      fs.appendFileSync(this.filePath, `${JSON.stringify(id)}\n`);
    } catch (error) {
      throw new StoreError("write", `Cannot append to ${this.filePath}: ${describeError(error)}`, {
        cause: error,
      });
    }

    this.ids.add(id);
    return true;
  }

  async close(): Promise<void> {
    // Every write is flushed as it happens
  }
}
