import type { RateLimitDecision } from "../infra/rate-limiter.js";

export interface RateLimiterPort {
  consume(identity: string, cost?: number): Promise<RateLimitDecision> | RateLimitDecision;
}
