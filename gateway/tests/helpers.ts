import { parsePolicy } from "../src/policy";
import type { AuditEvent, Policy } from "../src/types";

export function buildPolicy(overrides: Record<string, unknown> = {}): Policy {
  return parsePolicy({
    policy_id: "test-policy",
    version: "1",
    default: "deny",
    allow_rules: [
      {
        tool: "get_user",
        roles: ["support"],
        constraints: { user_id: { type: "string", pattern: "^EMP[0-9]{6}$" } },
      },
    ],
    deny_rules: [],
    ...overrides,
  });
}

export function collectingSink(): { events: AuditEvent[]; emit: (event: AuditEvent) => void } {
  const events: AuditEvent[] = [];
  return {
    events,
    emit: (event: AuditEvent) => {
      events.push(event);
    },
  };
}

export function fakeClock(start = 1_700_000_000_000): { now: () => number; advance: (ms: number) => void } {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}
