export { Reconciler, type ReconcileResult } from "./reconciler.js";
export { TERMINAL_STATES, initialStatus, type TaskState, type TaskStatus } from "./states.js";
