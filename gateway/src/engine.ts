import { isDeepStrictEqual } from "util";

import { matchConstraint } from "./constraints";
import { loadPolicy } from "./policy";
import type { AllowRule, Decision, DenyRule, Policy, ToolCall } from "./types";

export const DEFAULT_DENY_REASON = "no matching allow rule / default deny";
export const DEFAULT_ALLOW_REASON = "no matching allow rule / default allow";

export type PolicyEngineOptions = {
  /**
   * What happens when an allow rule for the tool is found but rejects the call
   * (role mismatch or failed constraint): try the next allow rule for the same
   * tool, or go straight to the policy default.
   */
  constraintFailure?: "next_rule" | "default";
};

/**
 * Evaluates tool calls against an immutable policy. Deny rules are checked
 * first and always win; allow rules are checked in document order; anything
 * left over gets the policy default.
 */
export class PolicyEngine {
  readonly policy: Policy;
  private readonly constraintFailure: "next_rule" | "default";

  constructor(policy: Policy, options: PolicyEngineOptions = {}) {
    this.policy = policy;
    this.constraintFailure = options.constraintFailure ?? "next_rule";
  }

  static fromFile(policyPath?: string, options?: PolicyEngineOptions): PolicyEngine {
    return new PolicyEngine(loadPolicy(policyPath), options);
  }

  evaluate(call: ToolCall): Decision {
    const denyRule = this.policy.deny_rules.find((rule) => denyRuleMatches(rule, call));
    if (denyRule) {
      return this.decision(false, denyRule.reason, "Remove the denied tool or argument values.");
    }

    let firstFailure: string | undefined;
    for (const rule of this.policy.allow_rules) {
      if (rule.tool !== call.tool_name) {
        continue;
      }
      const failure = allowRuleFailure(rule, call);
      if (failure === undefined) {
        return this.decision(true, "matched allow rule");
      }
      if (firstFailure === undefined) {
        firstFailure = failure;
      }
      if (this.constraintFailure === "default") {
        break;
      }
    }

    if (this.policy.default === "allow") {
      return this.decision(true, DEFAULT_ALLOW_REASON);
    }
    if (firstFailure !== undefined) {
      return this.decision(false, firstFailure, "Fix tool arguments to satisfy policy constraints.");
    }
    return this.decision(false, DEFAULT_DENY_REASON, "Request access via a policy update.");
  }

  private decision(allowed: boolean, reason: string, remediation?: string): Decision {
    return {
      allowed,
      reason,
      policy_id: this.policy.policy_id,
      ...(remediation !== undefined ? { remediation } : {}),
      layer: "authorize",
    };
  }
}

function denyRuleMatches(rule: DenyRule, call: ToolCall): boolean {
  if (rule.tool !== call.tool_name) {
    return false;
  }
  if (!rule.condition) {
    return true;
  }
  return Object.entries(rule.condition).every(
    ([key, expected]) =>
      Object.prototype.hasOwnProperty.call(call.arguments, key) &&
      isDeepStrictEqual(call.arguments[key], expected),
  );
}

/** Returns why the rule rejects the call, or undefined when it admits it. */
function allowRuleFailure(rule: AllowRule, call: ToolCall): string | undefined {
  if (rule.roles && rule.roles.length > 0) {
    const permitted = rule.roles.some((role) => call.roles.includes(role));
    if (!permitted) {
      return "role not permitted for tool";
    }
  }
  for (const [name, constraint] of Object.entries(rule.constraints)) {
    const value = Object.prototype.hasOwnProperty.call(call.arguments, name) ? call.arguments[name] : undefined;
    const outcome = matchConstraint(value, constraint);
    if (!outcome.ok) {
      return `argument "${name}": ${outcome.reason}`;
    }
  }
  return undefined;
}
