import { Counter, Histogram, Registry, collectDefaultMetrics } from "prom-client";
import { FETCH_TASK_DURATION_BUCKETS, MetricLabels, MetricNames, type AuthMode } from "@threadloom/shared";

/** Registry for crawl metrics */
export const registry = new Registry();

collectDefaultMetrics({ register: registry });

/** XRPC requests by endpoint and response status */
export const xrpcRequestsTotal = new Counter({
  name: MetricNames.XRPC_REQUESTS_TOTAL,
  help: "Total number of XRPC requests",
  labelNames: [MetricLabels.ENDPOINT, MetricLabels.STATUS_CODE, MetricLabels.AUTH_MODE],
  registers: [registry],
});

/** Comment-tree fetch tasks by outcome */
export const fetchTasksTotal = new Counter({
  name: MetricNames.FETCH_TASKS_TOTAL,
  help: "Total number of comment-tree fetch tasks",
  labelNames: [MetricLabels.STATUS, MetricLabels.ERROR_KIND],
  registers: [registry],
});

export const fetchTaskDuration = new Histogram({
  name: MetricNames.FETCH_TASK_DURATION,
  help: "Duration of one post's comment-tree fetch in seconds",
  labelNames: [MetricLabels.STATUS],
  buckets: FETCH_TASK_DURATION_BUCKETS,
  registers: [registry],
});

export const commentNodesTotal = new Counter({
  name: MetricNames.COMMENT_NODES_TOTAL,
  help: "Total number of comment nodes assembled",
  registers: [registry],
});

export const seedPostsTotal = new Counter({
  name: MetricNames.SEED_POSTS_TOTAL,
  help: "Total number of seed posts discovered",
  labelNames: [MetricLabels.SEED_MODE],
  registers: [registry],
});

export function recordXrpcRequest(params: { endpoint: string; status: number | null; mode: AuthMode }): void {
  xrpcRequestsTotal.inc({
    [MetricLabels.ENDPOINT]: params.endpoint,
    [MetricLabels.STATUS_CODE]: params.status === null ? "network_error" : String(params.status),
    [MetricLabels.AUTH_MODE]: params.mode,
  });
}

export type TaskStatus = "completed" | "partial" | "failed";

export function recordFetchTask(params: {
  status: TaskStatus;
  errorKind?: string;
  durationSec: number;
  nodes?: number;
}): void {
  fetchTasksTotal.inc({
    [MetricLabels.STATUS]: params.status,
    [MetricLabels.ERROR_KIND]: params.errorKind ?? "none",
  });
  fetchTaskDuration.observe({ [MetricLabels.STATUS]: params.status }, params.durationSec);
  if (params.nodes) commentNodesTotal.inc(params.nodes);
}

export function recordSeedPosts(mode: string, count: number): void {
  if (count > 0) seedPostsTotal.inc({ [MetricLabels.SEED_MODE]: mode }, count);
}

/**
 * Get metrics in Prometheus exposition format
 */
export async function getMetrics(): Promise<string> {
  return registry.metrics();
}
