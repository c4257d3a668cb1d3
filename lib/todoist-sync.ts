/**
 * Todoist Sync Module
 *
 * Reconciles the personal calendar against the reference timetable and turns
 * each qualifying event into a Todoist task, once.
 *
 * Per event:
 *   skip (no summary / excluded code / no start)
 *   -> resolve time: direct | matched (timetable) | fallback (23:00-23:59)
 *   -> already synced? | create task -> record identifier
 */

import type { DateTime } from "luxon";
import { atTimeOnDate, formatInstant, hasTimeOfDay, type CalendarEvent } from "./calendar-event.js";
import type { DedupStore } from "./dedup-store.js";
import { identifyEvent } from "./event-identifier.js";
import { fetchCalendarFeed } from "./ics-feed.js";
import { resolveTimes } from "./schedule-matcher.js";
import type { SyncConfig } from "./sync-config.js";
import {
  InconsistentStateError,
  StoreError,
  describeError,
  type TaskCreationError,
} from "./sync-errors.js";
import type { TaskSink } from "./task-sink.js";
import { extractCoreTitle } from "./title-matching.js";
import { annotateDeliveryMode } from "./zoom-annotator.js";

// ============================================================================
// Types
// ============================================================================

export type TimeResolution = "direct" | "matched" | "fallback";

export type SkipReason = "missing-summary" | "excluded" | "missing-start";

/**
 * What gets handed to the task sink
 */
export interface ReconciledTask {
  title: string;
  dueInstant: DateTime;
  end: DateTime;
  description: string;
}

export interface ResolvedEvent {
  identifier: string;
  resolution: TimeResolution;
  task: ReconciledTask;
}

export type EventOutcome =
  | { status: "skipped"; summary?: string; reason: SkipReason }
  | ({ status: "already-synced" } & ResolvedEvent)
  | ({ status: "would-create" } & ResolvedEvent)
  | ({ status: "created"; taskId: string } & ResolvedEvent)
  | ({ status: "failed"; error: TaskCreationError | StoreError } & ResolvedEvent)
  | ({ status: "inconsistent"; error: InconsistentStateError } & ResolvedEvent);

export interface SyncResult {
  outcomes: EventOutcome[];
  counts: {
    total: number;
    skipped: number;
    alreadySynced: number;
    created: number;
    wouldCreate: number;
    failed: number;
    inconsistent: number;
  };
  duration: number; // milliseconds
}

export interface SyncDependencies {
  store: DedupStore;
  sink: TaskSink;
}

export type ReconcileSettings = Pick<
  SyncConfig,
  "excludedCodes" | "titleRules" | "fallbackStart" | "fallbackEnd" | "timeZone"
>;

export interface SyncOptions {
  /** Resolve and check the store, but create nothing */
  dryRun?: boolean;
  /** Log each event, not just failures and totals */
  verbose?: boolean;
  /** Callback for progress updates */
  onProgress?: (message: string) => void;
  /** Callback for failures (default: onProgress) */
  onError?: (message: string) => void;
}

export interface FeedSources {
  personalUrl: string;
  referenceUrl: string;
}

// ============================================================================
// Resolution
// ============================================================================

function isExcluded(summary: string, excludedCodes: readonly string[]): boolean {
  return excludedCodes.some((code) => code.length > 0 && summary.includes(code));
}

/**
 * Resolve title, times and identifier for one personal event,
 * or say why it is skipped
 */
export function resolveEvent(
  event: CalendarEvent,
  referenceEvents: readonly CalendarEvent[],
  settings: ReconcileSettings
): ResolvedEvent | { skip: SkipReason } {
  const summary = event.summary;
  if (!summary) {
    return { skip: "missing-summary" };
  }
  if (isExcluded(summary, settings.excludedCodes)) {
    return { skip: "excluded" };
  }
  const start = event.start;
  if (!start) {
    return { skip: "missing-start" };
  }

  let resolution: TimeResolution;
  let dueInstant: DateTime;
  let end: DateTime;

  if (hasTimeOfDay(start)) {
    resolution = "direct";
    dueInstant = start.value;
    end = event.end ?? start.value.plus({ hours: 1 });
  } else {
    const matched = resolveTimes(event, referenceEvents, settings.titleRules);
    if (matched) {
      resolution = "matched";
      dueInstant = matched.start;
      end = matched.end;
    } else {
      resolution = "fallback";
      dueInstant = atTimeOnDate(start.date, settings.fallbackStart, settings.timeZone);
      end = atTimeOnDate(start.date, settings.fallbackEnd, settings.timeZone);
    }
  }

  const title = annotateDeliveryMode(extractCoreTitle(summary, settings.titleRules), event);

  return {
    identifier: identifyEvent(event),
    resolution,
    task: {
      title,
      dueInstant,
      end,
      description: `${event.location ?? ""}\n${event.description ?? ""}`,
    },
  };
}

// ============================================================================
// Reconciliation
// ============================================================================

function emptyCounts(): SyncResult["counts"] {
  return {
    total: 0,
    skipped: 0,
    alreadySynced: 0,
    created: 0,
    wouldCreate: 0,
    failed: 0,
    inconsistent: 0,
  };
}

function tally(counts: SyncResult["counts"], outcome: EventOutcome): void {
  counts.total++;
  switch (outcome.status) {
    case "skipped":
      counts.skipped++;
      break;
    case "already-synced":
      counts.alreadySynced++;
      break;
    case "would-create":
      counts.wouldCreate++;
      break;
    case "created":
      counts.created++;
      break;
    case "failed":
      counts.failed++;
      break;
    case "inconsistent":
      counts.inconsistent++;
      break;
  }
}

/**
 * Run the store check and task creation for one resolved event
 */
async function syncResolvedEvent(
  resolved: ResolvedEvent,
  deps: SyncDependencies,
  dryRun: boolean
): Promise<EventOutcome> {
  let synced: boolean;
  try {
    synced = await deps.store.hasBeenSynced(resolved.identifier);
  } catch (error) {
    // Unknown state: creating the task could duplicate it
    const storeError =
      error instanceof StoreError
        ? error
        : new StoreError("read", describeError(error), { cause: error });
    return { status: "failed", error: storeError, ...resolved };
  }

  if (synced) {
    return { status: "already-synced", ...resolved };
  }
  if (dryRun) {
    return { status: "would-create", ...resolved };
  }

  const { title, dueInstant, description } = resolved.task;
  const created = await deps.sink.createTask(title, dueInstant, description);
  if (!created.ok) {
    return { status: "failed", error: created.error, ...resolved };
  }

  try {
    await deps.store.markSynced(resolved.identifier);
  } catch (error) {
    return {
      status: "inconsistent",
      error: new InconsistentStateError(resolved.identifier, created.taskId, { cause: error }),
      ...resolved,
    };
  }

  return { status: "created", taskId: created.taskId, ...resolved };
}

function describeOutcome(outcome: EventOutcome): string {
  if (outcome.status === "skipped") {
    return `  - Skipped (${outcome.reason}): ${outcome.summary ?? "(no summary)"}`;
  }
  const when = formatInstant(outcome.task.dueInstant);
  const label = `${outcome.task.title} (${when}, ${outcome.resolution})`;
  switch (outcome.status) {
    case "already-synced":
      return `  = Already synced: ${label}`;
    case "would-create":
      return `  ? Would create: ${label}`;
    case "created":
      return `  + Created: ${label} - task ${outcome.taskId}`;
    case "failed":
      return `  ! Failed: ${label} - ${outcome.error.message}`;
    case "inconsistent":
      return `  !! Inconsistent: ${label} - ${outcome.error.message}`;
  }
}

/**
 * Reconcile already-parsed feeds. Events are processed one at a time, in feed
 * order; a failure on one event never stops the others.
 */
export async function reconcileEvents(
  personalEvents: readonly CalendarEvent[],
  referenceEvents: readonly CalendarEvent[],
  deps: SyncDependencies,
  settings: ReconcileSettings,
  options: SyncOptions = {}
): Promise<SyncResult> {
  const startTime = Date.now();
  const log = options.onProgress ?? (() => {});
  const logError = options.onError ?? log;
  const dryRun = options.dryRun ?? false;

  const outcomes: EventOutcome[] = [];
  const counts = emptyCounts();

  for (const event of personalEvents) {
    const resolved = resolveEvent(event, referenceEvents, settings);
    const outcome: EventOutcome =
      "skip" in resolved
        ? { status: "skipped", summary: event.summary, reason: resolved.skip }
        : await syncResolvedEvent(resolved, deps, dryRun);

    outcomes.push(outcome);
    tally(counts, outcome);

    if (outcome.status === "failed" || outcome.status === "inconsistent") {
      logError(describeOutcome(outcome));
    } else if (options.verbose || outcome.status === "created") {
      log(describeOutcome(outcome));
    }
  }

  return { outcomes, counts, duration: Date.now() - startTime };
}

/**
 * Fetch both feeds, then reconcile. A feed failure throws FetchError before
 * the store or Todoist are touched.
 */
export async function syncCalendarToTodoist(
  sources: FeedSources,
  deps: SyncDependencies,
  config: ReconcileSettings,
  options: SyncOptions = {}
): Promise<SyncResult> {
  const log = options.onProgress ?? (() => {});
  const feedOptions = { defaultZone: config.timeZone };

  log("Fetching personal calendar...");
  const personalEvents = await fetchCalendarFeed("personal", sources.personalUrl, feedOptions);
  log(`Fetched ${personalEvents.length} personal events`);

  log("Fetching reference timetable...");
  const referenceEvents = await fetchCalendarFeed("reference", sources.referenceUrl, feedOptions);
  log(`Fetched ${referenceEvents.length} timetable events`);

  log("Processing events...");
  return reconcileEvents(personalEvents, referenceEvents, deps, config, options);
}
