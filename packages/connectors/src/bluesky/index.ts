export * from "./at_uri";
export * from "./config";
export * from "./discovery";
export * from "./normalize";
export * from "./thread_api";
export { authorSeedProvider } from "./author";
export { discoverFeedPosts, feedSeedProvider, resolveFeedUri } from "./feed";
export { buildSearchQuery, searchSeedProvider } from "./search";
export { trendingSeedProvider, WHATS_HOT_FEED_URI } from "./trending";
