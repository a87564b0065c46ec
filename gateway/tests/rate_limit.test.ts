import { InMemoryRateLimiter, KeyedLock, RateLimiter, scopeKey } from "../src/rate_limit";
import { createToolCall } from "../src/tool_call";
import { buildPolicy, fakeClock } from "./helpers";

describe("InMemoryRateLimiter", () => {
  const params = { limitPerMinute: 60, burst: 10 };

  it("should admit a full burst then refill one token per second", () => {
    const clock = fakeClock();
    const limiter = new InMemoryRateLimiter({ now: clock.now });

    for (let i = 0; i < 10; i += 1) {
      expect(limiter.consume("actor:a", params).allowed).toBe(true);
    }
    expect(limiter.consume("actor:a", params)).toEqual({
      allowed: false,
      remaining: 0,
      retryAfterMs: 1000,
    });

    clock.advance(1000);
    expect(limiter.consume("actor:a", params).allowed).toBe(true);
    expect(limiter.consume("actor:a", params).allowed).toBe(false);
  });

  it("should report remaining tokens", () => {
    const limiter = new InMemoryRateLimiter({ now: fakeClock().now });
    expect(limiter.consume("k", params)).toEqual({ allowed: true, remaining: 9, retryAfterMs: 0 });
  });

  it("should never refill beyond the burst", () => {
    const clock = fakeClock();
    const limiter = new InMemoryRateLimiter({ now: clock.now });
    limiter.consume("k", params);
    clock.advance(60 * 60 * 1000);
    expect(limiter.consume("k", params).remaining).toBe(9);
  });

  it("should keep keys independent", () => {
    const limiter = new InMemoryRateLimiter({ now: fakeClock().now });
    const tight = { limitPerMinute: 60, burst: 1 };
    expect(limiter.consume("a", tight).allowed).toBe(true);
    expect(limiter.consume("a", tight).allowed).toBe(false);
    expect(limiter.consume("b", tight).allowed).toBe(true);
    expect(limiter.size()).toBe(2);
  });

  it("should size the bucket from the rate when burst is zero", () => {
    const limiter = new InMemoryRateLimiter({ now: fakeClock().now });
    const unburst = { limitPerMinute: 3, burst: 0 };
    expect(limiter.consume("k", unburst).remaining).toBe(2);
  });
});

describe("KeyedLock", () => {
  it("should run tasks for the same key one at a time", async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = lock.run("k", async () => {
      order.push("first:start");
      await gate;
      order.push("first:end");
    });
    const second = lock.run("k", () => {
      order.push("second");
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(order).toEqual(["first:start"]);

    release();
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
    expect(lock.pending()).toBe(0);
  });

  it("should not block other keys", async () => {
    const lock = new KeyedLock();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const held = lock.run("a", () => gate);

    await expect(lock.run("b", () => "done")).resolves.toBe("done");

    release();
    await held;
  });

  it("should keep the key usable after a task fails", async () => {
    const lock = new KeyedLock();
    await expect(
      lock.run("k", () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    await expect(lock.run("k", () => 1)).resolves.toBe(1);
  });
});

describe("scopeKey", () => {
  const call = createToolCall({
    tool_name: "search",
    actor: "agent-7",
    client: { session_id: "s-1" },
  });
  const base = { enabled: true, limit_per_minute: 60, burst: 10 };

  it("should derive the key from the configured scope", () => {
    expect(scopeKey(call, { ...base, scope: "global" })).toBe("global");
    expect(scopeKey(call, { ...base, scope: "actor" })).toBe("actor:agent-7");
    expect(scopeKey(call, { ...base, scope: "tool" })).toBe("tool:search");
    expect(scopeKey(call, { ...base, scope: "session" })).toBe("session:s-1");
    expect(scopeKey(call, { ...base, scope: "actor+tool" })).toBe("actor:agent-7:tool:search");
  });

  it("should group calls without an actor", () => {
    expect(scopeKey(createToolCall({ tool_name: "x" }), { ...base, scope: "actor" })).toBe(
      "actor:anonymous",
    );
  });
});

describe("RateLimiter", () => {
  const policy = buildPolicy({
    rate_limit: { enabled: true, limit_per_minute: 60, burst: 10, scope: "actor" },
  });
  const call = createToolCall({ tool_name: "get_user", actor: "agent-1" });

  it("should deny the eleventh call in the same instant", async () => {
    const limiter = new RateLimiter(new InMemoryRateLimiter({ now: fakeClock().now }));
    for (let i = 0; i < 10; i += 1) {
      await expect(limiter.check(call, policy)).resolves.toMatchObject({ allowed: true });
    }
    await expect(limiter.check(call, policy)).resolves.toEqual({
      allowed: false,
      reason: "rate limit exceeded",
      policy_id: "test-policy",
      remediation: "retry after 1s",
      layer: "rate_limit",
    });
  });

  it("should admit everything when disabled", async () => {
    const limiter = new RateLimiter(new InMemoryRateLimiter({ now: fakeClock().now }));
    await expect(limiter.check(call, buildPolicy())).resolves.toEqual({
      allowed: true,
      reason: "rate limit disabled",
      policy_id: "test-policy",
      layer: "rate_limit",
    });
  });

  it("should consult a pluggable backend", async () => {
    const consume = jest.fn(() => ({ allowed: false, remaining: 0, retryAfterMs: 2500 }));
    const limiter = new RateLimiter({ consume });
    const decision = await limiter.check(call, policy);
    expect(consume).toHaveBeenCalledWith("actor:agent-1", { limitPerMinute: 60, burst: 10 });
    expect(decision.remediation).toBe("retry after 3s");
  });
});
