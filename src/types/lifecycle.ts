export type RunStatus =
  | "pending" // created, not picked up yet
  | "running" // currently executing
  | "completed" // finished successfully
  | "failed" // failed permanently
  | "cancelled"; // cancelled by user
