/**
 * Shared metrics constants for Prometheus instrumentation.
 */

/** Standard label names used across packages */
export const MetricLabels = {
  // XRPC labels
  ENDPOINT: "endpoint",
  STATUS_CODE: "status_code",
  AUTH_MODE: "auth_mode",

  // Task labels
  STATUS: "status",
  ERROR_KIND: "error_kind",

  // Discovery labels
  SEED_MODE: "seed_mode",
} as const;

/** Standard metric names */
export const MetricNames = {
  XRPC_REQUESTS_TOTAL: "xrpc_requests_total",
  FETCH_TASKS_TOTAL: "fetch_tasks_total",
  FETCH_TASK_DURATION: "fetch_task_duration_seconds",
  COMMENT_NODES_TOTAL: "comment_nodes_total",
  SEED_POSTS_TOTAL: "seed_posts_total",
} as const;

/** Histogram buckets for one post's comment-tree fetch (seconds) */
export const FETCH_TASK_DURATION_BUCKETS = [0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60, 120];
