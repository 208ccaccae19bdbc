export * from "./config/crawl_config";
export * from "./config/load_dotenv";
export * from "./errors";
export * from "./logging";
export * from "./metrics";
export type * from "./types/content";
export type * from "./types/ports";
export * from "./utils/input";
