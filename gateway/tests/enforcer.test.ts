import path from "path";

import { Enforcer, enforceToolCall } from "../src/enforcer";
import { PolicyDeniedError, ToolExecutionError } from "../src/errors";
import { loadPolicy } from "../src/policy";
import { InMemoryRateLimiter } from "../src/rate_limit";
import { createToolCall } from "../src/tool_call";
import type { ToolCallInput } from "../src/tool_call";
import { buildPolicy, collectingSink, fakeClock } from "./helpers";

const FIXTURE_POLICY = path.join(__dirname, "..", "policy.yaml");
const fixedClock = () => new Date("2026-01-01T00:00:00.000Z");

function setup(policy = loadPolicy(FIXTURE_POLICY)) {
  const sink = collectingSink();
  const clock = fakeClock();
  const enforcer = new Enforcer(policy, {
    sink,
    clock: fixedClock,
    rateLimitBackend: new InMemoryRateLimiter({ now: clock.now }),
  });
  return { enforcer, sink, clock };
}

function getUser(input: Partial<ToolCallInput> = {}) {
  return createToolCall({
    tool_name: "get_user",
    arguments: { user_id: "EMP123456" },
    roles: ["support"],
    actor: "agent-1",
    request_id: "req-1",
    ...input,
  });
}

const lookupUser = jest.fn(async (args: Record<string, unknown>) => ({
  user_id: args.user_id,
  email: "alice@example.com",
  password: "test-secret",
}));

beforeEach(() => {
  lookupUser.mockClear();
});

describe("Enforcer.enforce", () => {
  it("should run an allowed call, redact its result and audit it", async () => {
    const { enforcer, sink } = setup();

    const result = await enforcer.enforce(getUser(), lookupUser);

    expect(result).toEqual({
      user_id: "EMP123456",
      email: "[REDACTED_EMAIL]",
      password: "[REDACTED]",
    });
    expect(lookupUser).toHaveBeenCalledWith({ user_id: "EMP123456" });
    expect(sink.events).toEqual([
      {
        timestamp: "2026-01-01T00:00:00.000Z",
        action: "tool_call",
        tool_name: "get_user",
        decision: "allow",
        reason: "matched allow rule",
        policy_id: "support-tools",
        actor: "agent-1",
        request_id: "req-1",
        layer: "authorize",
        latency_ms: expect.any(Number),
        arguments_summary: { keys: ["user_id"], key_count: 1 },
        redactions: 2,
      },
    ]);
  });

  it("should never invoke the tool for a denied call", async () => {
    const { enforcer, sink } = setup();

    const attempt = enforcer.enforce(getUser({ arguments: { user_id: "123" } }), lookupUser);

    await expect(attempt).rejects.toBeInstanceOf(PolicyDeniedError);
    await expect(attempt).rejects.toMatchObject({
      message: 'denied: argument "user_id": does not match pattern',
      reason: 'argument "user_id": does not match pattern',
      policyId: "support-tools",
      layer: "authorize",
    });
    expect(lookupUser).not.toHaveBeenCalled();
    expect(sink.events).toHaveLength(1);
    expect(sink.events[0]).toMatchObject({ decision: "deny", layer: "authorize" });
    expect(sink.events[0]).not.toHaveProperty("redactions");
  });

  it("should apply deny rules ahead of allow rules", async () => {
    const { enforcer } = setup();
    const call = createToolCall({ tool_name: "delete_user", roles: ["admin"] });

    await expect(enforcer.enforce(call, lookupUser)).rejects.toMatchObject({
      reason: "user deletion is never delegated to agents",
    });
  });

  it("should reject arguments the policy does not declare", async () => {
    const { enforcer } = setup();
    const call = getUser({ arguments: { user_id: "EMP123456", debug: true } });

    await expect(enforcer.enforce(call, lookupUser)).rejects.toMatchObject({
      reason: "unknown argument: debug",
      layer: "validate",
    });
    expect(lookupUser).not.toHaveBeenCalled();
  });

  it("should rate limit before any other layer", async () => {
    const { enforcer, sink } = setup();
    for (let i = 0; i < 10; i += 1) {
      await enforcer.enforce(getUser(), lookupUser);
    }

    const noisy = getUser({ arguments: { user_id: "EMP123456", debug: true } });
    await expect(enforcer.enforce(noisy, lookupUser)).rejects.toMatchObject({
      reason: "rate limit exceeded",
      layer: "rate_limit",
      decision: { remediation: "retry after 1s" },
    });
    expect(lookupUser).toHaveBeenCalledTimes(10);
    expect(sink.events).toHaveLength(11);
  });

  it("should refill the bucket as time passes", async () => {
    const { enforcer, clock } = setup();
    for (let i = 0; i < 10; i += 1) {
      await enforcer.enforce(getUser(), lookupUser);
    }
    clock.advance(1000);

    await expect(enforcer.enforce(getUser(), lookupUser)).resolves.toBeDefined();
  });

  it("should deny injection payloads after authorization", async () => {
    const { enforcer } = setup();
    const call = createToolCall({
      tool_name: "search_tickets",
      arguments: { query: "' OR '1'='1" },
      roles: ["support"],
    });
    const search = jest.fn(() => []);

    await expect(enforcer.enforce(call, search)).rejects.toMatchObject({
      reason: 'potential sql_injection detected in argument "query"',
      layer: "detect_attacks",
    });
    expect(search).not.toHaveBeenCalled();
  });

  it("should run flagged calls and record the detections", async () => {
    const { enforcer, sink } = setup(
      buildPolicy({
        allow_rules: [{ tool: "search", constraints: { query: { type: "string" } } }],
        detect_attacks: { enabled: true, on_detect: "flag", fields: ["query"] },
      }),
    );
    const call = createToolCall({ tool_name: "search", arguments: { query: "1 UNION SELECT x" } });

    await expect(enforcer.enforce(call, () => "ok")).resolves.toBe("ok");
    expect(sink.events[0]).toMatchObject({
      decision: "allow",
      flags: [{ field: "query", category: "sql_injection" }],
    });
  });

  it("should wrap tool failures and audit them as errors", async () => {
    const { enforcer, sink } = setup();
    const failing = jest.fn(() => {
      throw new Error("db down");
    });

    const attempt = enforcer.enforce(getUser(), failing);

    await expect(attempt).rejects.toBeInstanceOf(ToolExecutionError);
    await expect(attempt).rejects.toThrow("tool execution failed: db down");
    expect(sink.events).toHaveLength(1);
    expect(sink.events[0]).toMatchObject({
      decision: "error",
      reason: "tool execution failed",
      layer: "execute",
    });
  });

  it("should audit and rethrow internal failures", async () => {
    const sink = collectingSink();
    const enforcer = new Enforcer(loadPolicy(FIXTURE_POLICY), {
      sink,
      clock: fixedClock,
      rateLimitBackend: {
        consume: () => {
          throw new Error("store offline");
        },
      },
    });

    await expect(enforcer.enforce(getUser(), lookupUser)).rejects.toThrow("store offline");
    expect(lookupUser).not.toHaveBeenCalled();
    expect(sink.events).toHaveLength(1);
    expect(sink.events[0]).toMatchObject({
      decision: "error",
      reason: "enforcement failed: store offline",
    });
    expect(sink.events[0]).not.toHaveProperty("layer");
  });

  it("should admit exactly the burst under concurrent calls", async () => {
    const { enforcer, sink } = setup();

    const results = await Promise.allSettled(
      Array.from({ length: 15 }, () => enforcer.enforce(getUser(), lookupUser)),
    );

    expect(results.filter((result) => result.status === "fulfilled")).toHaveLength(10);
    const rejected = results.filter(
      (result): result is PromiseRejectedResult => result.status === "rejected",
    );
    expect(rejected).toHaveLength(5);
    for (const result of rejected) {
      expect(result.reason).toBeInstanceOf(PolicyDeniedError);
    }
    expect(sink.events).toHaveLength(15);
  });

  it("should honour audit overrides", async () => {
    const sink = collectingSink();
    const enforcer = new Enforcer(loadPolicy(FIXTURE_POLICY), {
      sink,
      clock: fixedClock,
      audit: { includeArgumentValues: true },
    });

    await enforcer.enforce(getUser(), lookupUser);

    expect(sink.events[0]?.arguments).toEqual({ user_id: "EMP123456" });
  });
});

describe("Enforcer.decide", () => {
  it("should report the verdict and audit it without running anything", async () => {
    const { enforcer, sink } = setup();

    await expect(enforcer.decide(getUser())).resolves.toEqual({
      allowed: true,
      reason: "matched allow rule",
      policy_id: "support-tools",
      layer: "authorize",
    });
    await expect(enforcer.decide(getUser({ roles: ["viewer"] }))).resolves.toMatchObject({
      allowed: false,
      reason: "role not permitted for tool",
    });
    expect(sink.events.map((event) => event.decision)).toEqual(["allow", "deny"]);
  });
});

describe("enforceToolCall", () => {
  it("should enforce every invocation of the wrapped tool", async () => {
    const { enforcer, sink } = setup();
    const wrapped = enforceToolCall(
      enforcer,
      "get_user",
      (args: { user_id: string }) => ({ user_id: args.user_id, token: "test-token" }),
      { roles: ["support"], actor: "agent-2" },
    );

    await expect(wrapped({ user_id: "EMP654321" }, "req-9")).resolves.toEqual({
      user_id: "EMP654321",
      token: "[REDACTED]",
    });
    await expect(wrapped({ user_id: "nope" })).rejects.toBeInstanceOf(PolicyDeniedError);
    expect(sink.events.map((event) => [event.actor, event.request_id, event.decision])).toEqual([
      ["agent-2", "req-9", "allow"],
      ["agent-2", undefined, "deny"],
    ]);
  });
});
