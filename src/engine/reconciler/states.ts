// Task lifecycle:
//
//   [*] --> Pending
//   Pending --> Scheduled     (picked by a worker)
//   Scheduled --> Running     (page context open, navigation started)
//   Running --> Succeeded
//   Running --> Failed        (error recorded; writes made so far are kept)
//   Succeeded --> [*]
//   Failed --> [*]

export type TaskState = "Pending" | "Scheduled" | "Running" | "Succeeded" | "Failed";

export const TERMINAL_STATES: ReadonlySet<TaskState> = new Set(["Succeeded", "Failed"]);

export interface TaskStatus {
  url: string;
  state: TaskState;
  lastError?: string;
  updatedAt: number;
}

export function initialStatus(url: string): TaskStatus {
  return {
    url,
    state: "Pending",
    updatedAt: Date.now(),
  };
}
