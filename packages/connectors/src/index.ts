export * from "./bluesky";
export * from "./registry";
export type * from "./types";
export * from "./xrpc/backoff";
export * from "./xrpc/factory";
export * from "./xrpc/http";
export * from "./xrpc/json";
export * from "./xrpc/paginate";
export * from "./xrpc/session";
export * from "./xrpc/transport";
