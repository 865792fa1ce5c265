import type { TaskState, TaskStatus } from "./states.js";
import { TERMINAL_STATES, initialStatus } from "./states.js";

export interface ReconcileResult {
  taskId: string;
  url: string;
  previous: TaskState;
  current: TaskState;
  error?: string;
}

/**
 * Tracks every crawl task through the lifecycle state machine and rejects
 * out-of-order transitions.
 */
export class Reconciler {
  private statuses = new Map<string, TaskStatus>();

  getStatus(taskId: string): TaskStatus | undefined {
    return this.statuses.get(taskId);
  }

  /** Register a task, placing it in Pending state. */
  register(taskId: string, url: string): void {
    if (this.statuses.has(taskId)) {
      throw new Error(`Task "${taskId}" is already registered`);
    }
    this.statuses.set(taskId, initialStatus(url));
  }

  schedule(taskId: string): ReconcileResult {
    return this.transition(taskId, "Pending", "Scheduled");
  }

  start(taskId: string): ReconcileResult {
    return this.transition(taskId, "Scheduled", "Running");
  }

  succeed(taskId: string): ReconcileResult {
    return this.transition(taskId, "Running", "Succeeded");
  }

  /** Tasks are not retried: a failure is terminal. */
  fail(taskId: string, error: string): ReconcileResult {
    const result = this.transition(taskId, "Running", "Failed");
    this.requireStatus(taskId).lastError = error;
    return { ...result, error };
  }

  isTerminal(taskId: string): boolean {
    const status = this.statuses.get(taskId);
    return status ? TERMINAL_STATES.has(status.state) : false;
  }

  /** Number of tasks per state. */
  counts(): Record<TaskState, number> {
    const counts: Record<TaskState, number> = {
      Pending: 0,
      Scheduled: 0,
      Running: 0,
      Succeeded: 0,
      Failed: 0,
    };
    for (const status of this.statuses.values()) counts[status.state]++;
    return counts;
  }

  private transition(taskId: string, expectedFrom: TaskState, to: TaskState): ReconcileResult {
    const status = this.requireStatus(taskId);
    if (status.state !== expectedFrom) {
      throw new Error(
        `Invalid transition for "${taskId}": expected "${expectedFrom}", got "${status.state}"`,
      );
    }
    const previous = status.state;
    status.state = to;
    status.updatedAt = Date.now();
    return { taskId, url: status.url, previous, current: to };
  }

  private requireStatus(taskId: string): TaskStatus {
    const s = this.statuses.get(taskId);
    if (!s) throw new Error(`Unknown task: "${taskId}"`);
    return s;
  }
}
