import fs from "fs";
import path from "path";
import yaml from "js-yaml";

import { ConfigurationError } from "./errors";
import type {
  AllowRule,
  AuditConfig,
  BooleanConstraint,
  Constraint,
  ConstraintType,
  DenyRule,
  DetectAttacksConfig,
  IntegerConstraint,
  NumberConstraint,
  Policy,
  RateLimitConfig,
  RateLimitScope,
  RedactConfig,
  StringConstraint,
  ValidateConfig,
} from "./types";
import { deepFreeze, isRecord } from "./util";

export const DEFAULT_DENY_KEYS: readonly string[] = [
  "password",
  "token",
  "secret",
  "api_key",
  "authorization",
];

export const DEFAULT_ATTACK_FIELDS: readonly string[] = ["query", "sql", "where", "url", "path"];

const CONSTRAINT_TYPES: readonly ConstraintType[] = ["string", "integer", "number", "boolean"];
const RATE_LIMIT_SCOPES: readonly RateLimitScope[] = [
  "global",
  "actor",
  "tool",
  "session",
  "actor+tool",
];

export function loadPolicy(policyPath?: string): Policy {
  const resolved =
    policyPath ?? process.env.GATEWAY_POLICY_PATH ?? path.resolve("policy.yaml");
  let raw: string;
  try {
    raw = fs.readFileSync(resolved, "utf8");
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError([`cannot read policy file: ${message}`]);
  }
  const format = path.extname(resolved).toLowerCase() === ".json" ? "json" : "yaml";
  return parsePolicyText(raw, format);
}

export function parsePolicyText(raw: string, format: "json" | "yaml"): Policy {
  let document: unknown;
  try {
    document = format === "json" ? JSON.parse(raw) : yaml.load(raw);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError([`cannot parse policy ${format}: ${message}`]);
  }
  return parsePolicy(document);
}

/** Validates a parsed document, fills defaults and returns a frozen Policy. */
export function parsePolicy(document: unknown): Policy {
  const errors: string[] = [];
  const policy = readPolicy(document, errors);
  if (!policy || errors.length > 0) {
    throw new ConfigurationError(errors);
  }
  return deepFreeze(policy);
}

export function validatePolicy(document: unknown): string[] {
  const errors: string[] = [];
  readPolicy(document, errors);
  return errors;
}

function readPolicy(document: unknown, errors: string[]): Policy | undefined {
  if (!isRecord(document)) {
    errors.push("policy not an object");
    return undefined;
  }
  const policyId = document.policy_id;
  if (typeof policyId !== "string" || policyId.trim() === "") {
    errors.push("policy_id must be a non-empty string");
  }
  const version = document.version;
  if (typeof version !== "string" && typeof version !== "number") {
    errors.push("version must be a string or number");
  }
  const defaultDecision = readEnum(document, "default", ["allow", "deny"], "deny", "policy", errors);

  const allowRules: AllowRule[] = [];
  const rawAllow = document.allow_rules ?? [];
  if (Array.isArray(rawAllow)) {
    rawAllow.forEach((rule, index) => {
      const parsed = readAllowRule(rule, `allow_rules[${index}]`, errors);
      if (parsed) {
        allowRules.push(parsed);
      }
    });
  } else {
    errors.push("allow_rules must be an array");
  }

  const denyRules: DenyRule[] = [];
  const rawDeny = document.deny_rules ?? [];
  if (Array.isArray(rawDeny)) {
    rawDeny.forEach((rule, index) => {
      const parsed = readDenyRule(rule, `deny_rules[${index}]`, errors);
      if (parsed) {
        denyRules.push(parsed);
      }
    });
  } else {
    errors.push("deny_rules must be an array");
  }

  const policy: Policy = {
    policy_id: typeof policyId === "string" ? policyId : "",
    version: typeof version === "string" || typeof version === "number" ? String(version) : "",
    default: defaultDecision,
    allow_rules: allowRules,
    deny_rules: denyRules,
    validate: readValidateConfig(readBlock(document, "validate", errors), errors),
    rate_limit: readRateLimitConfig(readBlock(document, "rate_limit", errors), errors),
    detect_attacks: readDetectAttacksConfig(readBlock(document, "detect_attacks", errors), errors),
    redact: readRedactConfig(readBlock(document, "redact", errors), errors),
    audit: readAuditConfig(readBlock(document, "audit", errors), errors),
  };
  return policy;
}

function readAllowRule(raw: unknown, where: string, errors: string[]): AllowRule | undefined {
  if (!isRecord(raw)) {
    errors.push(`${where} must be an object`);
    return undefined;
  }
  const tool = readTool(raw, where, errors);
  const roles = raw.roles == null ? undefined : readStringList(raw, "roles", [], where, errors);
  const constraints: Record<string, Constraint> = {};
  const rawConstraints = raw.constraints ?? {};
  if (isRecord(rawConstraints)) {
    for (const [name, spec] of Object.entries(rawConstraints)) {
      const constraint = readConstraint(spec, `${where}.constraints.${name}`, errors);
      if (constraint) {
        constraints[name] = constraint;
      }
    }
  } else {
    errors.push(`${where}.constraints must be an object`);
  }
  if (tool === undefined) {
    return undefined;
  }
  return roles === undefined ? { tool, constraints } : { tool, roles, constraints };
}

function readDenyRule(raw: unknown, where: string, errors: string[]): DenyRule | undefined {
  if (!isRecord(raw)) {
    errors.push(`${where} must be an object`);
    return undefined;
  }
  const tool = readTool(raw, where, errors);
  const condition = raw.condition;
  if (condition != null && !isRecord(condition)) {
    errors.push(`${where}.condition must be an object`);
  }
  const reason = raw.reason ?? "denied by policy";
  if (typeof reason !== "string") {
    errors.push(`${where}.reason must be a string`);
  }
  if (tool === undefined) {
    return undefined;
  }
  return {
    tool,
    ...(isRecord(condition) ? { condition } : {}),
    reason: typeof reason === "string" ? reason : "denied by policy",
  };
}

function readConstraint(raw: unknown, where: string, errors: string[]): Constraint | undefined {
  if (!isRecord(raw)) {
    errors.push(`${where} must be an object`);
    return undefined;
  }
  const type = CONSTRAINT_TYPES.find((item) => item === raw.type);
  if (!type) {
    errors.push(`${where}.type must be one of ${CONSTRAINT_TYPES.join(", ")}`);
    return undefined;
  }
  const required = readBoolean(raw, "required", false, where, errors);
  const description = raw.description;
  if (description != null && typeof description !== "string") {
    errors.push(`${where}.description must be a string`);
  }
  const base = {
    required,
    ...(typeof description === "string" ? { description } : {}),
  };

  if (type !== "string" && raw.pattern != null) {
    errors.push(`${where}.pattern only applies to string constraints`);
  }
  if (type !== "integer" && type !== "number" && (raw.min != null || raw.max != null)) {
    errors.push(`${where}.min/max only apply to integer or number constraints`);
  }

  switch (type) {
    case "string": {
      const pattern = readPattern(raw.pattern, where, errors);
      const values = readEnumValues(raw.enum, isString, where, errors);
      const constraint: StringConstraint = {
        ...base,
        type,
        ...(pattern !== undefined ? { pattern } : {}),
        ...(values !== undefined ? { enum: values } : {}),
      };
      return constraint;
    }
    case "integer":
    case "number": {
      const guard = type === "integer" ? isInteger : isFiniteNumber;
      const values = readEnumValues(raw.enum, guard, where, errors);
      const min = readBound(raw.min, `${where}.min`, errors);
      const max = readBound(raw.max, `${where}.max`, errors);
      if (min !== undefined && max !== undefined && min > max) {
        errors.push(`${where}.min must not exceed max`);
      }
      const constraint: IntegerConstraint | NumberConstraint = {
        ...base,
        type,
        ...(values !== undefined ? { enum: values } : {}),
        ...(min !== undefined ? { min } : {}),
        ...(max !== undefined ? { max } : {}),
      };
      return constraint;
    }
    case "boolean": {
      const values = readEnumValues(raw.enum, isBoolean, where, errors);
      const constraint: BooleanConstraint = {
        ...base,
        type,
        ...(values !== undefined ? { enum: values } : {}),
      };
      return constraint;
    }
  }
}

function readValidateConfig(block: Record<string, unknown>, errors: string[]): ValidateConfig {
  return {
    reject_unknown_args: readBoolean(block, "reject_unknown_args", false, "validate", errors),
    max_arg_bytes: readCount(block, "max_arg_bytes", 0, "validate", errors),
  };
}

function readRateLimitConfig(block: Record<string, unknown>, errors: string[]): RateLimitConfig {
  const config: RateLimitConfig = {
    enabled: readBoolean(block, "enabled", false, "rate_limit", errors),
    limit_per_minute: readCount(block, "limit_per_minute", 0, "rate_limit", errors),
    burst: readCount(block, "burst", 0, "rate_limit", errors),
    scope: readEnum(block, "scope", RATE_LIMIT_SCOPES, "actor", "rate_limit", errors),
  };
  if (config.enabled && config.limit_per_minute <= 0) {
    errors.push("rate_limit.limit_per_minute must be positive when enabled");
  }
  return config;
}

function readDetectAttacksConfig(
  block: Record<string, unknown>,
  errors: string[],
): DetectAttacksConfig {
  return {
    enabled: readBoolean(block, "enabled", false, "detect_attacks", errors),
    on_detect: readEnum(block, "on_detect", ["deny", "flag"], "deny", "detect_attacks", errors),
    fields: readStringList(block, "fields", DEFAULT_ATTACK_FIELDS, "detect_attacks", errors),
  };
}

function readRedactConfig(block: Record<string, unknown>, errors: string[]): RedactConfig {
  return {
    enabled: readBoolean(block, "enabled", false, "redact", errors),
    deny_keys: readStringList(block, "deny_keys", DEFAULT_DENY_KEYS, "redact", errors),
    deny_key_mode: readEnum(block, "deny_key_mode", ["mask", "remove"], "mask", "redact", errors),
    pii_emails: readBoolean(block, "pii_emails", true, "redact", errors),
    pii_phones: readBoolean(block, "pii_phones", false, "redact", errors),
    max_string_len: readCount(block, "max_string_len", 2048, "redact", errors),
  };
}

function readAuditConfig(block: Record<string, unknown>, errors: string[]): AuditConfig {
  return {
    enabled: readBoolean(block, "enabled", true, "audit", errors),
    include_argument_values: readBoolean(block, "include_argument_values", false, "audit", errors),
    include_result: readBoolean(block, "include_result", false, "audit", errors),
  };
}

function readBlock(
  document: Record<string, unknown>,
  key: string,
  errors: string[],
): Record<string, unknown> {
  const block = document[key];
  if (block == null) {
    return {};
  }
  if (!isRecord(block)) {
    errors.push(`${key} must be an object`);
    return {};
  }
  return block;
}

function readTool(raw: Record<string, unknown>, where: string, errors: string[]): string | undefined {
  if (typeof raw.tool !== "string" || raw.tool.trim() === "") {
    errors.push(`${where}.tool must be a non-empty string`);
    return undefined;
  }
  return raw.tool;
}

function readPattern(raw: unknown, where: string, errors: string[]): string | undefined {
  if (raw == null) {
    return undefined;
  }
  if (typeof raw !== "string") {
    errors.push(`${where}.pattern must be a string`);
    return undefined;
  }
  try {
    new RegExp(`^(?:${raw})$`);
  } catch {
    errors.push(`${where}.pattern is not a valid regular expression`);
    return undefined;
  }
  return raw;
}

function readEnumValues<T>(
  raw: unknown,
  guard: (item: unknown) => item is T,
  where: string,
  errors: string[],
): T[] | undefined {
  if (raw == null) {
    return undefined;
  }
  if (!Array.isArray(raw) || !raw.every(guard)) {
    errors.push(`${where}.enum must be an array of values matching the constraint type`);
    return undefined;
  }
  return raw;
}

function readBound(raw: unknown, where: string, errors: string[]): number | undefined {
  if (raw == null) {
    return undefined;
  }
  if (!isFiniteNumber(raw)) {
    errors.push(`${where} must be a number`);
    return undefined;
  }
  return raw;
}

function readBoolean(
  source: Record<string, unknown>,
  key: string,
  fallback: boolean,
  where: string,
  errors: string[],
): boolean {
  const value = source[key];
  if (value == null) {
    return fallback;
  }
  if (typeof value !== "boolean") {
    errors.push(`${where}.${key} must be boolean`);
    return fallback;
  }
  return value;
}

function readCount(
  source: Record<string, unknown>,
  key: string,
  fallback: number,
  where: string,
  errors: string[],
): number {
  const value = source[key];
  if (value == null) {
    return fallback;
  }
  if (!isFiniteNumber(value) || value < 0) {
    errors.push(`${where}.${key} must be a non-negative number`);
    return fallback;
  }
  return value;
}

function readStringList(
  source: Record<string, unknown>,
  key: string,
  fallback: readonly string[],
  where: string,
  errors: string[],
): readonly string[] {
  const value = source[key];
  if (value == null) {
    return fallback;
  }
  if (!Array.isArray(value) || !value.every(isString)) {
    errors.push(`${where}.${key} must be an array of strings`);
    return fallback;
  }
  return value;
}

function readEnum<T extends string>(
  source: Record<string, unknown>,
  key: string,
  allowed: readonly T[],
  fallback: T,
  where: string,
  errors: string[],
): T {
  const value = source[key];
  if (value == null) {
    return fallback;
  }
  const match = allowed.find((item) => item === value);
  if (match === undefined) {
    errors.push(`${where}.${key} must be one of ${allowed.join(", ")}`);
    return fallback;
  }
  return match;
}

function isString(value: unknown): value is string {
  return typeof value === "string";
}

function isBoolean(value: unknown): value is boolean {
  return typeof value === "boolean";
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function isInteger(value: unknown): value is number {
  return isFiniteNumber(value) && Number.isInteger(value);
}
