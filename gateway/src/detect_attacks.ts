import type {
  AttackCategory,
  AttackDetection,
  Decision,
  Policy,
  ToolCall,
} from "./types";
import { isRecord } from "./util";

export type ScanResult = {
  decision: Decision;
  detections: AttackDetection[];
};

// Heuristics only; these do not parse SQL, paths or URLs.
const ATTACK_PATTERNS: Array<{ category: AttackCategory; regex: RegExp }> = [
  { category: "sql_injection", regex: /\bunion\b(?:\s+all)?\s+select\b/i },
  { category: "sql_injection", regex: /['"]\s*(?:or|and)\s+['"]?\w+['"]?\s*=\s*['"]?\w+/i },
  { category: "sql_injection", regex: /['"]\s*(?:;|--|#|\/\*)/ },
  { category: "sql_injection", regex: /;\s*(?:drop|delete|insert|update|alter|truncate)\s/i },
  { category: "path_traversal", regex: /(?:^|[\\/])\.\.(?:[\\/]|$)/ },
  { category: "path_traversal", regex: /%2e%2e|%252e%252e/i },
  { category: "path_traversal", regex: /^(?:\/(?:etc|proc|sys|root)\/|~\/)/ },
  {
    category: "ssrf",
    regex: /\b(?:localhost|127(?:\.\d{1,3}){3}|0\.0\.0\.0|169\.254(?:\.\d{1,3}){2}|metadata\.google\.internal)\b/i,
  },
  { category: "ssrf", regex: /\[(?:::1?|0:0:0:0:0:0:0:1)\]/ },
  // fe80::/10 link-local and IPv4-mapped loopback in hex form
  { category: "ssrf", regex: /\[fe[89ab][0-9a-f]:[0-9a-f:]*(?:%[^\]]*)?\]/i },
  { category: "ssrf", regex: /\[(?:0{1,4}:){0,5}:{0,2}ffff:7f[0-9a-f]{2}:[0-9a-f]{1,4}\]/i },
];

/**
 * Scans the configured argument fields for injection-style payloads. With
 * `on_detect: flag` the call is allowed and every detection is returned for
 * the audit trail.
 */
export function scanToolCall(call: ToolCall, policy: Policy): ScanResult {
  const config = policy.detect_attacks;
  if (!config.enabled) {
    return { decision: buildDecision(policy, true, "attack detection disabled"), detections: [] };
  }

  const detections: AttackDetection[] = [];
  for (const field of config.fields) {
    if (!Object.prototype.hasOwnProperty.call(call.arguments, field)) {
      continue;
    }
    const category = detectCategory(stringForms(call.arguments[field]));
    if (!category) {
      continue;
    }
    const detection = { field, category };
    if (config.on_detect === "deny") {
      return {
        decision: buildDecision(
          policy,
          false,
          `potential ${category} detected in argument "${field}"`,
          "Remove suspicious patterns from arguments.",
        ),
        detections: [detection],
      };
    }
    detections.push(detection);
  }

  const reason = detections.length > 0 ? "suspicious arguments flagged" : "no attack patterns found";
  return { decision: buildDecision(policy, true, reason), detections };
}

export function detectCategory(values: string[]): AttackCategory | undefined {
  for (const value of values) {
    const hit = ATTACK_PATTERNS.find((pattern) => pattern.regex.test(value));
    if (hit) {
      return hit.category;
    }
  }
  return undefined;
}

function stringForms(value: unknown): string[] {
  if (typeof value === "string") {
    return [value];
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return [String(value)];
  }
  if (Array.isArray(value)) {
    return value.flatMap((item) => stringForms(item));
  }
  if (isRecord(value)) {
    return Object.values(value).flatMap((item) => stringForms(item));
  }
  return [];
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
    layer: "detect_attacks",
  };
}
