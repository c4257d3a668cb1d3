/**
 * Task Sink
 *
 * Where reconciled events end up. The sync core only needs one call,
 * createTask; failures come back as values so one rejected task never
 * unwinds the whole pass.
 */

import { TodoistApi } from "@doist/todoist-api-typescript";
import type { DateTime } from "luxon";
import { TaskCreationError, describeError } from "./sync-errors.js";

export type TaskResult =
  | { ok: true; taskId: string }
  | { ok: false; error: TaskCreationError };

export interface TaskSink {
  createTask(title: string, dueInstant: DateTime, description: string): Promise<TaskResult>;
}

export interface TodoistSinkOptions {
  /** Project to create tasks in (default: Inbox) */
  projectId?: string;
}

/**
 * Creates Todoist tasks through the REST API
 */
export class TodoistTaskSink implements TaskSink {
  private readonly api: TodoistApi;

  constructor(
    apiToken: string,
    private readonly options: TodoistSinkOptions = {}
  ) {
    this.api = new TodoistApi(apiToken);
  }

  async createTask(title: string, dueInstant: DateTime, description: string): Promise<TaskResult> {
    const dueDatetime = dueInstant.toUTC().toISO({ suppressMilliseconds: true });
    if (dueDatetime === null) {
      return {
        ok: false,
        error: new TaskCreationError(`Invalid due instant for "${title}"`),
      };
    }

    try {
      const task = await this.api.addTask({
        content: title,
        description,
        dueDatetime,
        projectId: this.options.projectId,
      });
      return { ok: true, taskId: task.id };
    } catch (error) {
      return {
        ok: false,
        error: new TaskCreationError(`Todoist rejected "${title}": ${describeError(error)}`, {
          cause: error,
        }),
      };
    }
  }
}
