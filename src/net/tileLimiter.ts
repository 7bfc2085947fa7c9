import { RateLimiter } from "./rateLimiter";

export const DEFAULT_TILE_CONCURRENCY = 8;

/** Shared by every retriever that is not given its own limiter. */
export const tileServiceRateLimiter = new RateLimiter({
  qps: 40,
  burst: 16,
  maxConcurrent: DEFAULT_TILE_CONCURRENCY,
  jitterRatio: 0.1
});
