#!/usr/bin/env node
/**
 * Todoist Sync CLI
 *
 * Turns personal calendar events into Todoist tasks, filling in lecture
 * times from the reference timetable. Each event is created once; already
 * synced events are remembered in the dedup store.
 *
 * Usage:
 *   npx tsx scripts/sync-todoist.ts                 # Sync now
 *   npx tsx scripts/sync-todoist.ts --dry-run       # Show what would be created
 *   npx tsx scripts/sync-todoist.ts --verbose       # Show every event
 */

import { loadTursoConfig, openDedupStore } from "../lib/dedup-db.js";
import type { DedupStore } from "../lib/dedup-store.js";
import { acquireRunLock } from "../lib/run-lock.js";
import { loadSyncConfig, readSyncEnvironment, type SyncEnvironment } from "../lib/sync-config.js";
import { TodoistTaskSink } from "../lib/task-sink.js";
import { syncCalendarToTodoist, type SyncOptions } from "../lib/todoist-sync.js";

function printHelp(): void {
  console.log(`
Todoist Sync CLI

Creates a Todoist task for each event in your personal calendar. All-day
entries get their time from the reference timetable when a lecture with
the same title runs that day, otherwise 23:00.

Usage:
  npx tsx scripts/sync-todoist.ts [options]

Options:
  --config <path>         Settings file (default: config/sync.json)
  --dry-run               Resolve events but create no tasks
  --verbose, -v           Show each event as it is processed
  --help, -h              Show this help message

Environment:
  TODOIST_API_TOKEN       Todoist API token
  USER_ICS_URL            Personal calendar feed (.ics)
  SCHEMA_ICS_URL          Reference timetable feed (.ics)
  `);
}

function loadEnvironment(): SyncEnvironment {
  try {
    return readSyncEnvironment();
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return process.exit(1);
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  // Parse arguments
  const options: SyncOptions = {};
  let configPath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      printHelp();
      process.exit(0);
    }

    if (arg === "--config" && args[i + 1]) {
      configPath = args[i + 1];
      i++;
      continue;
    }

    if (arg === "--dry-run") {
      options.dryRun = true;
      continue;
    }

    if (arg === "--verbose" || arg === "-v") {
      options.verbose = true;
      continue;
    }

    console.error(`Error: Unknown argument: ${arg}`);
    console.error("Run with --help for usage information.");
    process.exit(1);
  }

  const env = loadEnvironment();
  const config = loadSyncConfig(configPath);

  // Set up progress logging
  options.onProgress = (message: string) => {
    console.log(message);
  };
  options.onError = (message: string) => {
    console.error(message);
  };

  let releaseLock: (() => void) | undefined;
  let store: DedupStore | undefined;
  let exitCode = 0;

  try {
    releaseLock = acquireRunLock(config.lockPath);
    const turso = loadTursoConfig();
    if (turso) {
      console.log("Connecting to Turso cloud database...");
    }
    store = await openDedupStore(config.store, turso);
    const sink = new TodoistTaskSink(env.todoistApiToken, { projectId: config.todoistProjectId });

    if (options.dryRun) {
      console.log("Dry run - no tasks will be created\n");
    }

    const result = await syncCalendarToTodoist(
      { personalUrl: env.personalFeedUrl, referenceUrl: env.referenceFeedUrl },
      { store, sink },
      config,
      options
    );

    console.log("\n=== Sync Summary ===");
    console.log(`Events:          ${result.counts.total}`);
    console.log(`  Created:       +${result.counts.created}`);
    if (options.dryRun) {
      console.log(`  Would create:  ?${result.counts.wouldCreate}`);
    }
    console.log(`  Already synced: =${result.counts.alreadySynced}`);
    console.log(`  Skipped:       -${result.counts.skipped}`);
    console.log(`  Failed:        !${result.counts.failed}`);
    if (result.counts.inconsistent > 0) {
      console.error(
        `  Inconsistent:  ${result.counts.inconsistent} (created in Todoist but not recorded; check for duplicates)`
      );
      exitCode = 1;
    }
    console.log(`Duration: ${(result.duration / 1000).toFixed(1)}s`);
  } catch (error) {
    console.error("Sync failed:", error);
    exitCode = 1;
  } finally {
    await store?.close();
    releaseLock?.();
  }

  process.exit(exitCode);
}

main().catch((error: unknown) => {
  console.error("Sync failed:", error);
  process.exit(1);
});
