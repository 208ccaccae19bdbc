export * from "./comment_tree/fetch";
export * from "./metrics";
export * from "./scheduler/run";
export * from "./scheduler/worker_pool";
export * from "./sinks/json_file";
export * from "./sinks/memory";
export * from "./stages/filter";
