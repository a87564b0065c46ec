import { argumentsSizeBytes } from "./tool_call";
import type { Decision, Policy, ToolCall } from "./types";

/**
 * Structural checks that run ahead of authorization: payload size and, when
 * enabled, rejection of argument keys no allow rule for the tool declares.
 */
export function validateToolCall(call: ToolCall, policy: Policy): Decision {
  const config = policy.validate;

  if (config.max_arg_bytes > 0) {
    const size = argumentsSizeBytes(call);
    if (size > config.max_arg_bytes) {
      return buildDecision(
        policy,
        false,
        `argument payload too large (${Number.isFinite(size) ? size : "unserializable"} > ${config.max_arg_bytes} bytes)`,
        "Reduce arguments payload size.",
      );
    }
  }

  if (config.reject_unknown_args) {
    const known = declaredArguments(policy, call.tool_name);
    const unknown = Object.keys(call.arguments)
      .filter((key) => !known.has(key))
      .sort();
    if (unknown.length > 0) {
      return buildDecision(
        policy,
        false,
        `unknown argument: ${unknown[0]}`,
        "Remove arguments the policy does not declare.",
      );
    }
  }

  return buildDecision(policy, true, "arguments valid");
}

function declaredArguments(policy: Policy, toolName: string): Set<string> {
  const known = new Set<string>();
  for (const rule of policy.allow_rules) {
    if (rule.tool !== toolName) {
      continue;
    }
    for (const key of Object.keys(rule.constraints)) {
      known.add(key);
    }
  }
  return known;
}

function buildDecision(
  policy: Policy,
  allowed: boolean,
  reason: string,
  remediation?: string,
): Decision {
  return {
    allowed,
    reason,
    policy_id: policy.policy_id,
    ...(remediation !== undefined ? { remediation } : {}),
    layer: "validate",
  };
}
