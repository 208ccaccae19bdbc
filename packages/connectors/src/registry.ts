import type { SeedProvider } from "./types";
import { authorSeedProvider } from "./bluesky/author";
import { feedSeedProvider } from "./bluesky/feed";
import { searchSeedProvider } from "./bluesky/search";
import { trendingSeedProvider } from "./bluesky/trending";

export const SEED_PROVIDERS: SeedProvider[] = [
  searchSeedProvider,
  authorSeedProvider,
  feedSeedProvider,
  trendingSeedProvider,
];

export function getSeedProvider(mode: string): SeedProvider | undefined {
  return SEED_PROVIDERS.find((p) => p.mode === mode);
}
