export { AuditEmitter, ConsoleAuditSink, DEFAULT_AUDIT_OPTIONS, summarizeArguments } from "./audit";
export type { AuditOptions, AuditRecord, AuditSink } from "./audit";
export { matchConstraint } from "./constraints";
export type { MatchOutcome } from "./constraints";
export { scanToolCall } from "./detect_attacks";
export { DEFAULT_ALLOW_REASON, DEFAULT_DENY_REASON, PolicyEngine } from "./engine";
export type { PolicyEngineOptions } from "./engine";
export { Enforcer, enforceToolCall } from "./enforcer";
export type { CallerIdentity, EnforcerOptions } from "./enforcer";
export {
  ConfigurationError,
  GatewayError,
  InvalidToolCallError,
  PolicyDeniedError,
  ToolExecutionError,
} from "./errors";
export { Pipeline } from "./pipeline";
export type { PipelineOutcome } from "./pipeline";
export { DEFAULT_DENY_KEYS, loadPolicy, parsePolicy, parsePolicyText, validatePolicy } from "./policy";
export { InMemoryRateLimiter, KeyedLock, RateLimiter } from "./rate_limit";
export type { RateLimitBackend, RateLimitVerdict } from "./rate_limit";
export { redactValue } from "./redact";
export { createGateApp } from "./server";
export { argumentsSizeBytes, createToolCall, parseToolCall } from "./tool_call";
export { validateToolCall } from "./validator";
export type {
  AllowRule,
  AttackCategory,
  AttackDetection,
  AuditConfig,
  AuditEvent,
  Constraint,
  Decision,
  DenyRule,
  DetectAttacksConfig,
  PipelineLayer,
  Policy,
  RateLimitConfig,
  RedactConfig,
  ToolCall,
  ToolFunction,
  ValidateConfig,
} from "./types";
