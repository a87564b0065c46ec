import type { Decision, PipelineLayer } from "./types";

export type PublicError = {
  message: string;
  code: string;
};

export class GatewayError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Thrown by the enforcer when any layer produced `allowed=false`. */
export class PolicyDeniedError extends GatewayError {
  readonly decision: Decision;

  constructor(decision: Decision) {
    super(`denied: ${decision.reason}`, "policy_denied");
    this.decision = decision;
  }

  get reason(): string {
    return this.decision.reason;
  }

  get policyId(): string {
    return this.decision.policy_id;
  }

  get layer(): PipelineLayer | undefined {
    return this.decision.layer;
  }
}

/** The tool itself failed after every layer allowed the call. */
export class ToolExecutionError extends GatewayError {
  readonly decision: Decision;

  constructor(decision: Decision, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`tool execution failed: ${detail}`, "tool_execution_failed", { cause });
    this.decision = decision;
  }
}

export class ConfigurationError extends GatewayError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`policy invalid: ${errors.join("; ")}`, "configuration_error");
    this.errors = errors;
  }
}

export class InvalidToolCallError extends GatewayError {
  constructor(message: string) {
    super(message, "invalid_tool_call");
  }
}

export function buildPublicError(
  error: unknown,
  fallbackMessage: string,
  fallbackCode: string,
): PublicError {
  if (error instanceof Error) {
    const message = error.message || fallbackMessage;
    const code = error instanceof GatewayError ? error.code : fallbackCode;
    const safeMessage = message.length > 300 ? `${message.slice(0, 300)}…` : message;
    return { message: safeMessage, code };
  }
  return { message: fallbackMessage, code: fallbackCode };
}
