/**
 * Dedup Database Module
 *
 * libsql-backed DedupStore. One row per event that became a Todoist task.
 *
 * Supports:
 * - Turso cloud database (production, config/turso.json)
 * - Local SQLite file (development)
 * - In-memory SQLite (testing)
 */

import { createClient, type Client } from "@libsql/client";
import * as path from "path";
import * as fs from "fs";
import { FileDedupStore, type DedupStore } from "./dedup-store.js";
import type { StoreConfig } from "./sync-config.js";
import { StoreError, describeError } from "./sync-errors.js";

const CONFIG_DIR = path.join(process.cwd(), "config");
const TURSO_CONFIG_PATH = path.join(CONFIG_DIR, "turso.json");

export interface TursoConfig {
  url: string;
  authToken: string;
}

/**
 * Load Turso configuration from config file
 */
export function loadTursoConfig(configPath: string = TURSO_CONFIG_PATH): TursoConfig | null {
  if (!fs.existsSync(configPath)) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(configPath, "utf-8"));
    if (
      typeof parsed === "object" &&
      parsed !== null &&
      "url" in parsed &&
      "authToken" in parsed &&
      typeof parsed.url === "string" &&
      typeof parsed.authToken === "string"
    ) {
      return { url: parsed.url, authToken: parsed.authToken };
    }
    return null;
  } catch {
    return null;
  }
}

/**
 * Turn a plain path into a libsql URL, creating its directory.
 * URLs (file:, libsql:, https:) and ":memory:" pass through.
 */
function toDatabaseUrl(location: string): string {
  if (location === ":memory:" || /^[a-z]+:/i.test(location)) {
    return location;
  }
  const dir = path.dirname(location);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  return `file:${location}`;
}

export class LibsqlDedupStore implements DedupStore {
  private constructor(private readonly client: Client) {}

  /**
   * Open the database, creating the table if it doesn't exist
   * @param location ":memory:", a file path, or a libsql/Turso URL
   */
  static async open(location: string, authToken?: string): Promise<LibsqlDedupStore> {
    try {
      const client = createClient({ url: toDatabaseUrl(location), authToken });
      await client.execute(`
        CREATE TABLE IF NOT EXISTS synced_events (
          id TEXT PRIMARY KEY,
          synced_at TEXT NOT NULL
        )
      `);
      return new LibsqlDedupStore(client);
    } catch (error) {
      throw new StoreError("open", `Cannot open dedup database: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  async hasBeenSynced(id: string): Promise<boolean> {
    try {
      const result = await this.client.execute({
        sql: "SELECT 1 FROM synced_events WHERE id = ?",
        args: [id],
      });
      return result.rows.length > 0;
    } catch (error) {
      throw new StoreError("read", `Cannot look up "${id}": ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  async markSynced(id: string): Promise<boolean> {
    try {
      const result = await this.client.execute({
        sql: "INSERT INTO synced_events (id, synced_at) VALUES (?, ?) ON CONFLICT(id) DO NOTHING",
        args: [id, new Date().toISOString()],
      });
      return result.rowsAffected > 0;
    } catch (error) {
      throw new StoreError("write", `Cannot record "${id}": ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  async close(): Promise<void> {
    this.client.close();
  }
}

/**
 * Open the configured dedup backend. A config/turso.json overrides the
 * configured backend with the remote database.
 */
export async function openDedupStore(
  store: StoreConfig,
  turso: TursoConfig | null = loadTursoConfig()
): Promise<DedupStore> {
  if (turso) {
    return LibsqlDedupStore.open(turso.url, turso.authToken);
  }
  if (store.backend === "libsql") {
    return LibsqlDedupStore.open(store.url, store.authToken);
  }
  return FileDedupStore.open(store.path);
}
