import type { Decision, Policy, RateLimitConfig, ToolCall } from "./types";

export type RateLimitParams = {
  limitPerMinute: number;
  burst: number;
};

export type RateLimitVerdict = {
  allowed: boolean;
  remaining: number;
  /** 0 when allowed. */
  retryAfterMs: number;
};

/** Storage for per-key admission state; swap in a shared store for multi-process setups. */
export interface RateLimitBackend {
  consume(key: string, params: RateLimitParams): RateLimitVerdict | Promise<RateLimitVerdict>;
}

type TokenBucket = {
  tokens: number;
  lastRefillMs: number;
};

/**
 * In-memory token bucket per key. Buckets are created full on first sight and
 * never expire.
 */
export class InMemoryRateLimiter implements RateLimitBackend {
  private readonly buckets = new Map<string, TokenBucket>();
  private readonly now: () => number;

  constructor(options: { now?: () => number } = {}) {
    this.now = options.now ?? Date.now;
  }

  consume(key: string, params: RateLimitParams): RateLimitVerdict {
    const capacity = Math.max(1, params.burst > 0 ? params.burst : params.limitPerMinute);
    const ratePerMs = params.limitPerMinute / 60_000;
    const now = this.now();

    let bucket = this.buckets.get(key);
    if (!bucket) {
      bucket = { tokens: capacity, lastRefillMs: now };
      this.buckets.set(key, bucket);
    }

    const elapsed = Math.max(0, now - bucket.lastRefillMs);
    bucket.tokens = Math.min(capacity, bucket.tokens + elapsed * ratePerMs);
    bucket.lastRefillMs = now;

    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      return { allowed: true, remaining: Math.floor(bucket.tokens), retryAfterMs: 0 };
    }
    const retryAfterMs = ratePerMs > 0 ? Math.ceil((1 - bucket.tokens) / ratePerMs) : Infinity;
    return { allowed: false, remaining: 0, retryAfterMs };
  }

  size(): number {
    return this.buckets.size;
  }
}

/**
 * Serializes async work per key. Work on different keys never waits on each
 * other.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(task);
    const tail = current.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    try {
      return await current;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  pending(): number {
    return this.tails.size;
  }
}

export function scopeKey(call: ToolCall, config: RateLimitConfig): string {
  const actor = call.actor ?? "anonymous";
  switch (config.scope) {
    case "global":
      return "global";
    case "actor":
      return `actor:${actor}`;
    case "tool":
      return `tool:${call.tool_name}`;
    case "session": {
      const sessionId = call.client?.session_id;
      return `session:${typeof sessionId === "string" ? sessionId : "unknown"}`;
    }
    case "actor+tool":
      return `actor:${actor}:tool:${call.tool_name}`;
  }
}

export class RateLimiter {
  private readonly backend: RateLimitBackend;
  private readonly lock = new KeyedLock();

  constructor(backend: RateLimitBackend = new InMemoryRateLimiter()) {
    this.backend = backend;
  }

  async check(call: ToolCall, policy: Policy): Promise<Decision> {
    const config = policy.rate_limit;
    if (!config.enabled || config.limit_per_minute <= 0) {
      return { allowed: true, reason: "rate limit disabled", policy_id: policy.policy_id, layer: "rate_limit" };
    }

    const key = scopeKey(call, config);
    const verdict = await this.lock.run(key, () =>
      this.backend.consume(key, { limitPerMinute: config.limit_per_minute, burst: config.burst }),
    );
    if (verdict.allowed) {
      return { allowed: true, reason: "within rate limit", policy_id: policy.policy_id, layer: "rate_limit" };
    }
    const retrySeconds = Number.isFinite(verdict.retryAfterMs)
      ? Math.max(1, Math.ceil(verdict.retryAfterMs / 1000))
      : undefined;
    return {
      allowed: false,
      reason: "rate limit exceeded",
      policy_id: policy.policy_id,
      remediation: retrySeconds !== undefined ? `retry after ${retrySeconds}s` : "Wait and retry later.",
      layer: "rate_limit",
    };
  }
}
