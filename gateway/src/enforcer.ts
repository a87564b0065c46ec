import { AuditEmitter, auditOptionsFromConfig } from "./audit";
import type { AuditOptions, AuditRecord, AuditSink } from "./audit";
import { PolicyEngine } from "./engine";
import type { PolicyEngineOptions } from "./engine";
import { PolicyDeniedError, ToolExecutionError } from "./errors";
import { Pipeline } from "./pipeline";
import type { PipelineOutcome, PrecheckOutcome } from "./pipeline";
import { loadPolicy } from "./policy";
import { RateLimiter } from "./rate_limit";
import type { RateLimitBackend } from "./rate_limit";
import { createToolCall } from "./tool_call";
import type { Decision, Policy, ToolCall, ToolFunction } from "./types";

export type EnforcerOptions = {
  sink?: AuditSink;
  /** Overrides what the policy's `audit` block says. */
  audit?: Partial<AuditOptions>;
  rateLimitBackend?: RateLimitBackend;
  engine?: PolicyEngineOptions;
  clock?: () => Date;
};

/**
 * Public entry point. Runs each call through the pipeline, emits exactly one
 * audit event for it and either returns the redacted result or throws a
 * structured error.
 */
export class Enforcer {
  readonly pipeline: Pipeline;
  private readonly auditor: AuditEmitter;

  constructor(policy: Policy, options: EnforcerOptions = {}) {
    const engine = new PolicyEngine(policy, options.engine);
    this.pipeline = new Pipeline(engine, new RateLimiter(options.rateLimitBackend));
    const auditOptions: AuditOptions = {
      ...auditOptionsFromConfig(policy.audit, policy.redact.deny_keys),
      ...options.audit,
    };
    this.auditor = new AuditEmitter(options.sink, auditOptions, options.clock);
  }

  static fromFile(policyPath?: string, options?: EnforcerOptions): Enforcer {
    return new Enforcer(loadPolicy(policyPath), options);
  }

  get policy(): Policy {
    return this.pipeline.policy;
  }

  async enforce(call: ToolCall, tool: ToolFunction): Promise<unknown> {
    const started = performance.now();
    const latency = () => Math.round(performance.now() - started);

    let outcome: PipelineOutcome;
    try {
      outcome = await this.pipeline.run(call, tool);
    } catch (error: unknown) {
      await this.auditInternalFailure(call, latency(), error);
      throw error;
    }

    switch (outcome.status) {
      case "denied":
        await this.audit({ call, outcome: "deny", decision: outcome.decision, latencyMs: latency() });
        throw new PolicyDeniedError(outcome.decision);
      case "failed":
        await this.audit({
          call,
          outcome: "error",
          decision: outcome.decision,
          latencyMs: latency(),
          flags: outcome.flags,
        });
        throw new ToolExecutionError(outcome.decision, outcome.error);
      case "completed":
        await this.audit({
          call,
          outcome: "allow",
          decision: outcome.decision,
          latencyMs: latency(),
          flags: outcome.flags,
          redactions: outcome.redactions,
          result: outcome.result,
        });
        return outcome.result;
    }
  }

  /** Evaluates the pre-execution layers and audits the verdict without running anything. */
  async decide(call: ToolCall): Promise<Decision> {
    const started = performance.now();
    const latency = () => Math.round(performance.now() - started);

    let precheck: PrecheckOutcome;
    try {
      precheck = await this.pipeline.decide(call);
    } catch (error: unknown) {
      await this.auditInternalFailure(call, latency(), error);
      throw error;
    }

    if (precheck.status === "denied") {
      await this.audit({ call, outcome: "deny", decision: precheck.decision, latencyMs: latency() });
    } else {
      await this.audit({
        call,
        outcome: "allow",
        decision: precheck.decision,
        latencyMs: latency(),
        flags: precheck.flags,
      });
    }
    return precheck.decision;
  }

  private async audit(record: AuditRecord): Promise<void> {
    await this.auditor.emit(record);
  }

  private async auditInternalFailure(call: ToolCall, latencyMs: number, error: unknown): Promise<void> {
    const detail = error instanceof Error ? error.message : String(error);
    await this.audit({
      call,
      outcome: "error",
      decision: {
        allowed: false,
        reason: `enforcement failed: ${detail}`,
        policy_id: this.policy.policy_id,
      },
      latencyMs,
    });
  }
}

export type CallerIdentity = {
  roles?: readonly string[];
  actor?: string;
};

/** Wraps a tool function so every invocation is enforced under `toolName`. */
export function enforceToolCall<TArgs extends Record<string, unknown>>(
  enforcer: Enforcer,
  toolName: string,
  tool: (args: TArgs) => unknown,
  identity: CallerIdentity = {},
): (args: TArgs, requestId?: string) => Promise<unknown> {
  return (args, requestId) =>
    enforcer.enforce(
      createToolCall({
        tool_name: toolName,
        arguments: args,
        roles: identity.roles,
        actor: identity.actor,
        request_id: requestId,
      }),
      () => tool(args),
    );
}
