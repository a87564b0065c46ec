import { scanToolCall } from "./detect_attacks";
import { PolicyEngine } from "./engine";
import { RateLimiter } from "./rate_limit";
import { redactValue } from "./redact";
import type {
  AttackDetection,
  Decision,
  Policy,
  ToolCall,
  ToolFunction,
} from "./types";
import { validateToolCall } from "./validator";

export type PipelineOutcome =
  | { status: "denied"; decision: Decision }
  | { status: "failed"; decision: Decision; flags: AttackDetection[]; error: unknown }
  | {
      status: "completed";
      decision: Decision;
      flags: AttackDetection[];
      result: unknown;
      redactions: number;
    };

export type PrecheckOutcome =
  | { status: "denied"; decision: Decision }
  | { status: "admitted"; decision: Decision; flags: AttackDetection[] };

/**
 * Runs RATE_LIMIT → VALIDATE → AUTHORIZE → DETECT → EXECUTE → REDACT. The first
 * denying layer ends the run; nothing executes before every check has passed.
 */
export class Pipeline {
  readonly engine: PolicyEngine;
  private readonly rateLimiter: RateLimiter;

  constructor(engine: PolicyEngine, rateLimiter: RateLimiter = new RateLimiter()) {
    this.engine = engine;
    this.rateLimiter = rateLimiter;
  }

  get policy(): Policy {
    return this.engine.policy;
  }

  /** Pre-execution layers only; the tool is never touched. */
  async decide(call: ToolCall): Promise<PrecheckOutcome> {
    const rateLimited = await this.rateLimiter.check(call, this.policy);
    if (!rateLimited.allowed) {
      return { status: "denied", decision: rateLimited };
    }

    const validated = validateToolCall(call, this.policy);
    if (!validated.allowed) {
      return { status: "denied", decision: validated };
    }

    const authorized = this.engine.evaluate(call);
    if (!authorized.allowed) {
      return { status: "denied", decision: authorized };
    }

    const scan = scanToolCall(call, this.policy);
    if (!scan.decision.allowed) {
      return { status: "denied", decision: scan.decision };
    }
    return { status: "admitted", decision: authorized, flags: scan.detections };
  }

  async run(call: ToolCall, tool: ToolFunction): Promise<PipelineOutcome> {
    const precheck = await this.decide(call);
    if (precheck.status === "denied") {
      return precheck;
    }
    const { decision, flags } = precheck;

    let result: unknown;
    try {
      result = await tool({ ...call.arguments });
    } catch (error: unknown) {
      return {
        status: "failed",
        decision: {
          allowed: true,
          reason: "tool execution failed",
          policy_id: decision.policy_id,
          layer: "execute",
        },
        flags,
        error,
      };
    }

    const redactConfig = this.policy.redact;
    if (!redactConfig.enabled) {
      return { status: "completed", decision, flags, result, redactions: 0 };
    }
    const { redacted, findings } = redactValue(result, redactConfig);
    return { status: "completed", decision, flags, result: redacted, redactions: findings.length };
  }
}
