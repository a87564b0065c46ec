import type { Constraint } from "./types";

export type MatchFailureCode =
  | "missing_required"
  | "type_mismatch"
  | "pattern_mismatch"
  | "not_in_enum"
  | "below_minimum"
  | "above_maximum";

export type MatchOutcome =
  | { ok: true }
  | { ok: false; code: MatchFailureCode; reason: string };

const OK: MatchOutcome = { ok: true };

const patternCache = new Map<string, RegExp>();

/**
 * Checks one argument value against its constraint. Violations are reported in
 * a fixed order (required, type, pattern, enum, range) so the same input always
 * yields the same reason.
 */
export function matchConstraint(value: unknown, constraint: Constraint): MatchOutcome {
  if (value === undefined) {
    return constraint.required
      ? fail("missing_required", "missing required argument")
      : OK;
  }

  switch (constraint.type) {
    case "string": {
      if (typeof value !== "string") {
        return fail("type_mismatch", "type mismatch: expected string");
      }
      if (constraint.pattern !== undefined && !fullMatch(constraint.pattern).test(value)) {
        return fail("pattern_mismatch", "does not match pattern");
      }
      return checkEnum(value, constraint.enum);
    }
    case "integer":
    case "number": {
      if (!isNumberOfType(value, constraint.type)) {
        return fail("type_mismatch", `type mismatch: expected ${constraint.type}`);
      }
      const enumOutcome = checkEnum(value, constraint.enum);
      if (!enumOutcome.ok) {
        return enumOutcome;
      }
      if (constraint.min !== undefined && value < constraint.min) {
        return fail("below_minimum", `below minimum ${constraint.min}`);
      }
      if (constraint.max !== undefined && value > constraint.max) {
        return fail("above_maximum", `above maximum ${constraint.max}`);
      }
      return OK;
    }
    case "boolean": {
      if (typeof value !== "boolean") {
        return fail("type_mismatch", "type mismatch: expected boolean");
      }
      return checkEnum(value, constraint.enum);
    }
    default:
      return assertNever(constraint);
  }
}

/** Compiles (and caches) a pattern anchored to the whole string. */
export function fullMatch(pattern: string): RegExp {
  let compiled = patternCache.get(pattern);
  if (!compiled) {
    compiled = new RegExp(`^(?:${pattern})$`);
    patternCache.set(pattern, compiled);
  }
  return compiled;
}

function isNumberOfType(value: unknown, type: "integer" | "number"): value is number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    return false;
  }
  return type === "number" || Number.isInteger(value);
}

function checkEnum<T>(value: T, allowed: readonly T[] | undefined): MatchOutcome {
  if (allowed === undefined || allowed.some((item) => item === value)) {
    return OK;
  }
  return fail("not_in_enum", "not in enum");
}

function fail(code: MatchFailureCode, reason: string): MatchOutcome {
  return { ok: false, code, reason };
}

function assertNever(value: never): never {
  throw new Error(`unsupported constraint: ${JSON.stringify(value)}`);
}
