import { DEFAULT_DENY_KEYS } from "./policy";
import type { RedactConfig, RedactionFinding } from "./types";

export const REDACTED = "[REDACTED]";
export const REDACTED_EMAIL = "[REDACTED_EMAIL]";
export const REDACTED_PHONE = "[REDACTED_PHONE]";

const EMAIL_REGEX = /\b[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}\b/gi;
const PHONE_REGEX = /(?:\+?\d{1,3}[-.\s]?)?(?:\(\d{3}\)|\b\d{3})[-.\s]?\d{3}[-.\s]?\d{4}\b/g;

export type RedactOptions = Omit<RedactConfig, "enabled">;

export const DEFAULT_REDACT_OPTIONS: RedactOptions = {
  deny_keys: DEFAULT_DENY_KEYS,
  deny_key_mode: "mask",
  pii_emails: true,
  pii_phones: false,
  max_string_len: 2048,
};

export const CIRCULAR = "[Circular]";

const PLACEHOLDER_REGEX = /\[REDACTED_(?:EMAIL|PHONE)\]/g;

/**
 * Scrubs a tool result. Keys in the deny set are masked or dropped; PII inside
 * string leaves is replaced with placeholders before the leaf is truncated.
 * Plain objects, arrays, maps and sets keep their shape; other values are
 * returned as-is.
 */
export function redactValue(
  value: unknown,
  options: RedactOptions = DEFAULT_REDACT_OPTIONS,
): { redacted: unknown; findings: RedactionFinding[] } {
  const denyKeys = new Set(options.deny_keys.map((key) => key.toLowerCase()));
  const findings: RedactionFinding[] = [];
  const walk: Walk = { ...options, denyKeys, ancestors: new WeakSet<object>(), findings };
  return { redacted: redactNode(value, "", walk), findings };
}

type Walk = RedactOptions & {
  denyKeys: Set<string>;
  ancestors: WeakSet<object>;
  findings: RedactionFinding[];
};

function redactNode(value: unknown, path: string, walk: Walk): unknown {
  if (typeof value === "string") {
    return redactText(value, path, walk);
  }
  if (typeof value !== "object" || value === null) {
    return value;
  }
  if (!Array.isArray(value) && !(value instanceof Map) && !(value instanceof Set) && !isPlainObject(value)) {
    return value;
  }
  if (walk.ancestors.has(value)) {
    return CIRCULAR;
  }
  walk.ancestors.add(value);
  try {
    return redactContainer(value, path, walk);
  } finally {
    walk.ancestors.delete(value);
  }
}

function redactContainer(value: object, path: string, walk: Walk): unknown {
  if (Array.isArray(value)) {
    return value.map((item, index) => redactNode(item, `${path}[${index}]`, walk));
  }
  if (value instanceof Set) {
    return new Set([...value].map((item, index) => redactNode(item, `${path}[${index}]`, walk)));
  }
  if (value instanceof Map) {
    const result = new Map<unknown, unknown>();
    for (const [key, child] of value) {
      const keyPath = path ? `${path}.${String(key)}` : String(key);
      if (typeof key === "string" && isDeniedKey(key, keyPath, walk)) {
        if (walk.deny_key_mode === "mask") {
          result.set(key, REDACTED);
        }
        continue;
      }
      result.set(key, redactNode(child, keyPath, walk));
    }
    return result;
  }

  const result: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    const keyPath = path ? `${path}.${key}` : key;
    if (isDeniedKey(key, keyPath, walk)) {
      if (walk.deny_key_mode === "mask") {
        result[key] = REDACTED;
      }
      continue;
    }
    result[key] = redactNode(child, keyPath, walk);
  }
  return result;
}

function isDeniedKey(key: string, keyPath: string, walk: Walk): boolean {
  if (!walk.denyKeys.has(key.toLowerCase())) {
    return false;
  }
  walk.findings.push({ path: keyPath, type: "deny_key" });
  return true;
}

function redactText(text: string, path: string, walk: Walk): string {
  let redacted = text;
  if (walk.pii_emails) {
    redacted = redacted.replace(EMAIL_REGEX, () => {
      walk.findings.push({ path, type: "email" });
      return REDACTED_EMAIL;
    });
  }
  if (walk.pii_phones) {
    redacted = redacted.replace(PHONE_REGEX, () => {
      walk.findings.push({ path, type: "phone" });
      return REDACTED_PHONE;
    });
  }
  if (walk.max_string_len > 0 && redacted.length > walk.max_string_len) {
    redacted = `${redacted.slice(0, truncationPoint(redacted, walk.max_string_len))}…`;
    walk.findings.push({ path, type: "truncated" });
  }
  return redacted;
}

/** Moves the cut back so it never splits a placeholder or a surrogate pair. */
function truncationPoint(text: string, limit: number): number {
  let cut = limit;
  for (const match of text.matchAll(PLACEHOLDER_REGEX)) {
    const start = match.index ?? 0;
    if (start >= cut) {
      break;
    }
    if (start + match[0].length > cut) {
      cut = start;
      break;
    }
  }
  const previous = text.charCodeAt(cut - 1);
  if (cut > 0 && previous >= 0xd800 && previous <= 0xdbff) {
    cut -= 1;
  }
  return cut;
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
