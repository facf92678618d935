import type { Redis } from "ioredis";
import { AppError } from "../../infra/app-error.js";
import type { RateLimitDecision } from "../../infra/rate-limiter.js";
import type { RateLimiterPort } from "../../ports/rate-limiter.js";

interface RedisRateLimiterOptions {
  windowSeconds: number;
  maxRequests: number;
  keyPrefix: string;
  maxIdleWindows?: number;
  nowMs?: () => number;
}

const WEIGHTED_TOKEN_BUCKET_LUA = `
local key = KEYS[1]
local now_ms = tonumber(ARGV[1])
local window_ms = tonumber(ARGV[2])
local max_requests = tonumber(ARGV[3])
local max_idle_ms = tonumber(ARGV[4])
local cost = tonumber(ARGV[5])

local refill_rate = max_requests / window_ms
local tokens = tonumber(redis.call('HGET', key, 'tokens'))
local last_refill_ms = tonumber(redis.call('HGET', key, 'last_refill_ms'))

if not tokens or not last_refill_ms then
  tokens = max_requests
  last_refill_ms = now_ms
end

if now_ms > last_refill_ms then
  tokens = math.min(max_requests, tokens + (now_ms - last_refill_ms) * refill_rate)
  last_refill_ms = now_ms
end

local allowed = 0
if tokens >= cost then
  tokens = tokens - cost
  allowed = 1
end

local remaining = math.max(0, math.floor(tokens))
local retry_seconds = 0
if allowed == 0 then
  retry_seconds = math.max(1, math.ceil(((cost - tokens) / refill_rate) / 1000))
end
local reset_seconds = math.max(1, math.ceil(((max_requests - tokens) / refill_rate) / 1000))

redis.call('HSET', key,
  'tokens', tokens,
  'last_refill_ms', last_refill_ms,
  'last_seen_ms', now_ms
)
redis.call('PEXPIRE', key, max_idle_ms)

return { allowed, max_requests, remaining, reset_seconds, retry_seconds }
`;

function toReplyNumbers(raw: unknown): number[] {
  if (!Array.isArray(raw) || raw.length < 5) {
    throw new AppError(500, "rate_limiter_reply_error", "Unexpected reply from the rate limiter script.");
  }
  return raw.map((value: unknown) => Number(value));
}

export class RedisRateLimiter implements RateLimiterPort {
  private readonly windowMs: number;
  private readonly maxIdleMs: number;
  private readonly nowMs: () => number;

  constructor(
    private readonly redis: Redis,
    private readonly options: RedisRateLimiterOptions,
  ) {
    this.windowMs = options.windowSeconds * 1000;
    this.maxIdleMs = this.windowMs * (options.maxIdleWindows ?? 3);
    this.nowMs = options.nowMs ?? (() => Date.now());
  }

  async consume(identity: string, cost = 1): Promise<RateLimitDecision> {
    const key = `${this.options.keyPrefix}:${identity}`;
    const effectiveCost = Math.min(Math.max(1, cost), this.options.maxRequests);
    const reply = toReplyNumbers(
      await this.redis.eval(
        WEIGHTED_TOKEN_BUCKET_LUA,
        1,
        key,
        this.nowMs(),
        this.windowMs,
        this.options.maxRequests,
        this.maxIdleMs,
        effectiveCost,
      ),
    );
    const [allowed = 0, limit = this.options.maxRequests, remaining = 0, resetSeconds = 1, retryAfterSeconds = 0] =
      reply;

    return {
      allowed: allowed === 1,
      limit,
      remaining,
      resetSeconds,
      retryAfterSeconds,
    };
  }
}
