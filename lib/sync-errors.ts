/**
 * Sync Errors
 *
 * - FetchError: a feed could not be retrieved or parsed. Fatal for the run.
 * - TaskCreationError: Todoist rejected one task. The event stays unsynced.
 * - StoreError: the dedup store could not be read or written.
 * - InconsistentStateError: a task was created but could not be recorded,
 *   so the next run may create it again.
 */

export type FeedName = "personal" | "reference";

export class FetchError extends Error {
  constructor(
    readonly feed: FeedName,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to load ${feed} feed: ${message}`, options);
    this.name = "FetchError";
  }
}

export class TaskCreationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TaskCreationError";
  }
}

export class StoreError extends Error {
  constructor(
    readonly operation: "read" | "write" | "open",
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "StoreError";
  }
}

export class InconsistentStateError extends Error {
  constructor(
    readonly identifier: string,
    readonly taskId: string,
    options?: { cause?: unknown }
  ) {
    super(
      `Task ${taskId} was created but "${identifier}" could not be recorded as synced; ` +
        "the next run may create a duplicate",
      options
    );
    this.name = "InconsistentStateError";
  }
}

/**
 * Message text of an unknown thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
