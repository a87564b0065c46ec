export type ToolCall = {
  readonly tool_name: string;
  readonly arguments: Readonly<Record<string, unknown>>;
  readonly roles: readonly string[];
  readonly actor?: string;
  readonly request_id?: string;
  readonly client?: Readonly<Record<string, unknown>>;
};

export type ToolFunction<TResult = unknown> = (
  args: Record<string, unknown>,
) => TResult | Promise<TResult>;

type ConstraintBase = {
  required?: boolean;
  description?: string;
};

export type StringConstraint = ConstraintBase & {
  type: "string";
  pattern?: string;
  enum?: readonly string[];
};

export type IntegerConstraint = ConstraintBase & {
  type: "integer";
  enum?: readonly number[];
  min?: number;
  max?: number;
};

export type NumberConstraint = ConstraintBase & {
  type: "number";
  enum?: readonly number[];
  min?: number;
  max?: number;
};

export type BooleanConstraint = ConstraintBase & {
  type: "boolean";
  enum?: readonly boolean[];
};

export type Constraint =
  | StringConstraint
  | IntegerConstraint
  | NumberConstraint
  | BooleanConstraint;

export type ConstraintType = Constraint["type"];

export type AllowRule = {
  readonly tool: string;
  readonly roles?: readonly string[];
  readonly constraints: Readonly<Record<string, Constraint>>;
};

export type DenyRule = {
  readonly tool: string;
  readonly condition?: Readonly<Record<string, unknown>>;
  readonly reason: string;
};

export type ValidateConfig = {
  readonly reject_unknown_args: boolean;
  /** 0 disables the size check. */
  readonly max_arg_bytes: number;
};

export type RateLimitScope = "global" | "actor" | "tool" | "session" | "actor+tool";

export type RateLimitConfig = {
  readonly enabled: boolean;
  readonly limit_per_minute: number;
  readonly burst: number;
  readonly scope: RateLimitScope;
};

export type DetectAttacksConfig = {
  readonly enabled: boolean;
  readonly on_detect: "deny" | "flag";
  readonly fields: readonly string[];
};

export type RedactConfig = {
  readonly enabled: boolean;
  readonly deny_keys: readonly string[];
  readonly deny_key_mode: "mask" | "remove";
  readonly pii_emails: boolean;
  readonly pii_phones: boolean;
  readonly max_string_len: number;
};

export type AuditConfig = {
  readonly enabled: boolean;
  readonly include_argument_values: boolean;
  readonly include_result: boolean;
};

export type Policy = {
  readonly policy_id: string;
  readonly version: string;
  readonly default: "allow" | "deny";
  readonly allow_rules: readonly AllowRule[];
  readonly deny_rules: readonly DenyRule[];
  readonly validate: ValidateConfig;
  readonly rate_limit: RateLimitConfig;
  readonly detect_attacks: DetectAttacksConfig;
  readonly redact: RedactConfig;
  readonly audit: AuditConfig;
};

export type PipelineLayer =
  | "rate_limit"
  | "validate"
  | "authorize"
  | "detect_attacks"
  | "execute"
  | "redact";

export type Decision = {
  readonly allowed: boolean;
  readonly reason: string;
  readonly policy_id: string;
  readonly remediation?: string;
  readonly layer?: PipelineLayer;
};

export type AttackCategory = "sql_injection" | "path_traversal" | "ssrf";

export type AttackDetection = {
  field: string;
  category: AttackCategory;
};

export type RedactionFinding = {
  path: string;
  type: "deny_key" | "email" | "phone" | "truncated";
};

export type ArgumentsSummary = {
  keys: string[];
  key_count: number;
};

export type AuditEvent = {
  timestamp: string;
  action: "tool_call";
  tool_name: string;
  decision: "allow" | "deny" | "error";
  reason: string;
  policy_id: string;
  actor?: string;
  request_id?: string;
  layer?: PipelineLayer;
  latency_ms: number;
  arguments_summary: ArgumentsSummary;
  flags?: AttackDetection[];
  redactions?: number;
  arguments?: unknown;
  result?: unknown;
};
