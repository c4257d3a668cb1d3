/**
 * Sync Configuration
 *
 * Non-secret settings live in config/sync.json and are merged over the
 * defaults below; a missing or unreadable file means "all defaults".
 * Secrets (API token, feed URLs) only ever come from the environment.
 */

import * as fs from "fs";
import * as path from "path";
import { IANAZone } from "luxon";
import type { ClockTime } from "./calendar-event.js";
import { DEFAULT_TITLE_RULES, type TitleRules } from "./title-matching.js";

// ============================================================================
// Types
// ============================================================================

export type StoreConfig =
  | { backend: "file"; path: string }
  | { backend: "libsql"; url: string; authToken?: string };

export interface SyncConfig {
  /** Course/section codes whose events never become tasks (substring, case-sensitive) */
  excludedCodes: string[];
  titleRules: TitleRules;
  /** Time given to date-only events the timetable has no slot for */
  fallbackStart: ClockTime;
  fallbackEnd: ClockTime;
  /** Zone for fallback times and floating feed times */
  timeZone: string;
  store: StoreConfig;
  lockPath: string;
  todoistProjectId?: string;
}

export interface SyncEnvironment {
  todoistApiToken: string;
  personalFeedUrl: string;
  referenceFeedUrl: string;
}

// ============================================================================
// Constants
// ============================================================================

const CONFIG_DIR = path.join(process.cwd(), "config");
const DATA_DIR = path.join(process.cwd(), "data");
const DEFAULT_CONFIG_PATH = path.join(CONFIG_DIR, "sync.json");

const CLOCK_TIME = /^([01]\d|2[0-3]):[0-5]\d$/;

// ============================================================================
// Default Config
// ============================================================================

export function getDefaultSyncConfig(): SyncConfig {
  return {
    excludedCodes: ["BMA152", "[BMA052 HT24]", "[BMA201 VT25]"],
    titleRules: {
      anchor: DEFAULT_TITLE_RULES.anchor,
      delimiters: [...DEFAULT_TITLE_RULES.delimiters],
    },
    fallbackStart: "23:00",
    fallbackEnd: "23:59",
    timeZone: "Europe/Stockholm",
    store: { backend: "file", path: path.join(DATA_DIR, "added_events.txt") },
    lockPath: path.join(DATA_DIR, "todoist-sync.lock"),
  };
}

// ============================================================================
// Config Loading
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === "string" && value.length > 0 ? value : fallback;
}

function stringListOr(value: unknown, fallback: string[]): string[] {
  if (!Array.isArray(value)) return fallback;
  return value.filter((entry): entry is string => typeof entry === "string");
}

function clockTimeOr(value: unknown, fallback: ClockTime): ClockTime {
  return typeof value === "string" && CLOCK_TIME.test(value) ? value : fallback;
}

function parseStoreConfig(value: unknown, defaults: SyncConfig): StoreConfig {
  if (!isRecord(value)) {
    return defaults.store;
  }
  if (value.backend === "libsql") {
    const authToken = typeof value.authToken === "string" ? value.authToken : undefined;
    return {
      backend: "libsql",
      url: stringOr(value.url, path.join(DATA_DIR, "sync.db")),
      authToken,
    };
  }
  return {
    backend: "file",
    path: stringOr(value.path, path.join(DATA_DIR, "added_events.txt")),
  };
}

/**
 * Merge a parsed config object over the defaults, field by field
 */
export function mergeSyncConfig(parsed: unknown): SyncConfig {
  const defaults = getDefaultSyncConfig();
  if (!isRecord(parsed)) {
    return defaults;
  }

  const rules = isRecord(parsed.titleRules) ? parsed.titleRules : {};
  const timeZone = stringOr(parsed.timeZone, defaults.timeZone);

  return {
    excludedCodes: stringListOr(parsed.excludedCodes, defaults.excludedCodes),
    titleRules: {
      anchor: stringOr(rules.anchor, defaults.titleRules.anchor),
      delimiters: stringListOr(rules.delimiters, defaults.titleRules.delimiters),
    },
    fallbackStart: clockTimeOr(parsed.fallbackStart, defaults.fallbackStart),
    fallbackEnd: clockTimeOr(parsed.fallbackEnd, defaults.fallbackEnd),
    timeZone: IANAZone.isValidZone(timeZone) ? timeZone : defaults.timeZone,
    store: parseStoreConfig(parsed.store, defaults),
    lockPath: stringOr(parsed.lockPath, defaults.lockPath),
    todoistProjectId:
      typeof parsed.todoistProjectId === "string" ? parsed.todoistProjectId : undefined,
  };
}

/**
 * Load sync settings from a JSON config file.
 * Returns the defaults if the file doesn't exist or is invalid.
 */
export function loadSyncConfig(configPath: string = DEFAULT_CONFIG_PATH): SyncConfig {
  try {
    if (!fs.existsSync(configPath)) {
      return getDefaultSyncConfig();
    }
    const content = fs.readFileSync(configPath, "utf-8");
    return mergeSyncConfig(JSON.parse(content));
  } catch {
    return getDefaultSyncConfig();
  }
}

// ============================================================================
// Environment
// ============================================================================

/**
 * Read secrets from the environment. Throws listing every missing variable.
 */
export function readSyncEnvironment(
  env: Record<string, string | undefined> = process.env
): SyncEnvironment {
  const required = ["TODOIST_API_TOKEN", "USER_ICS_URL", "SCHEMA_ICS_URL"] as const;
  const missing = required.filter((name) => !env[name]);
  if (missing.length > 0) {
    throw new Error(`Missing environment variables: ${missing.join(", ")}`);
  }

  return {
    todoistApiToken: env.TODOIST_API_TOKEN ?? "",
    personalFeedUrl: env.USER_ICS_URL ?? "",
    referenceFeedUrl: env.SCHEMA_ICS_URL ?? "",
  };
}
