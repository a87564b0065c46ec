import { DEFAULT_DENY_KEYS } from "./policy";
import { redactValue } from "./redact";
import type {
  ArgumentsSummary,
  AttackDetection,
  AuditConfig,
  AuditEvent,
  Decision,
  ToolCall,
} from "./types";

export interface AuditSink {
  emit(event: AuditEvent): void | Promise<void>;
}

/** What may reach the sink. Argument values and results stay out unless raised here. */
export type AuditOptions = {
  enabled: boolean;
  includeArgumentValues: boolean;
  includeResult: boolean;
  denyKeys: readonly string[];
};

export const DEFAULT_AUDIT_OPTIONS: AuditOptions = {
  enabled: true,
  includeArgumentValues: false,
  includeResult: false,
  denyKeys: DEFAULT_DENY_KEYS,
};

export type AuditRecord = {
  call: ToolCall;
  outcome: "allow" | "deny" | "error";
  decision: Decision;
  latencyMs: number;
  flags?: AttackDetection[];
  redactions?: number;
  result?: unknown;
};

export function auditOptionsFromConfig(
  config: AuditConfig,
  denyKeys: readonly string[] = DEFAULT_DENY_KEYS,
): AuditOptions {
  return {
    enabled: config.enabled,
    includeArgumentValues: config.include_argument_values,
    includeResult: config.include_result,
    denyKeys,
  };
}

export class ConsoleAuditSink implements AuditSink {
  constructor(private readonly stream: NodeJS.WritableStream = process.stdout) {}

  emit(event: AuditEvent): void {
    this.stream.write(`${JSON.stringify(event)}\n`);
  }
}

export class AuditEmitter {
  private readonly sink: AuditSink;
  private readonly options: AuditOptions;
  private readonly now: () => Date;

  constructor(
    sink: AuditSink = new ConsoleAuditSink(),
    options: AuditOptions = DEFAULT_AUDIT_OPTIONS,
    now: () => Date = () => new Date(),
  ) {
    this.sink = sink;
    this.options = options;
    this.now = now;
  }

  buildEvent(record: AuditRecord): AuditEvent {
    const { call, decision } = record;
    const event: AuditEvent = {
      timestamp: this.now().toISOString(),
      action: "tool_call",
      tool_name: call.tool_name,
      decision: record.outcome,
      reason: decision.reason,
      policy_id: decision.policy_id,
      latency_ms: record.latencyMs,
      arguments_summary: summarizeArguments(call.arguments),
    };
    if (call.actor !== undefined) {
      event.actor = call.actor;
    }
    if (call.request_id !== undefined) {
      event.request_id = call.request_id;
    }
    if (decision.layer !== undefined) {
      event.layer = decision.layer;
    }
    if (record.flags && record.flags.length > 0) {
      event.flags = record.flags;
    }
    if (record.redactions !== undefined && record.redactions > 0) {
      event.redactions = record.redactions;
    }
    if (this.options.includeArgumentValues) {
      event.arguments = this.scrub(call.arguments);
    }
    if (this.options.includeResult && record.result !== undefined) {
      event.result = this.scrub(record.result);
    }
    return event;
  }

  async emit(record: AuditRecord): Promise<AuditEvent | undefined> {
    if (!this.options.enabled) {
      return undefined;
    }
    const event = this.buildEvent(record);
    await this.sink.emit(event);
    return event;
  }

  private scrub(value: unknown): unknown {
    return redactValue(value, {
      deny_keys: this.options.denyKeys,
      deny_key_mode: "mask",
      pii_emails: true,
      pii_phones: true,
      max_string_len: 256,
    }).redacted;
  }
}

export function summarizeArguments(args: Readonly<Record<string, unknown>>): ArgumentsSummary {
  const keys = Object.keys(args).sort();
  return { keys, key_count: keys.length };
}
