#!/usr/bin/env node
/**
 * Gateway CLI - check policies, dry-run tool calls and redact JSON from stdin
 * Usage:
 *   echo '{}' | gateway-cli validate-policy
 *   echo '{"tool_name":"get_user","arguments":{"user_id":"EMP123456"},"roles":["support"]}' | gateway-cli decide
 *   echo '{"password":"test-secret"}' | gateway-cli redact
 */

import path from "path";

import { ConsoleAuditSink } from "../audit";
import { Enforcer } from "../enforcer";
import { ConfigurationError, buildPublicError } from "../errors";
import { loadPolicy } from "../policy";
import { DEFAULT_REDACT_OPTIONS, redactValue } from "../redact";
import { parseToolCall } from "../tool_call";

export type CliResult = {
  code: number;
  output: string;
};

const COMMANDS = ["validate-policy", "decide", "redact"];

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

export async function runCli(
  command: string | undefined,
  input: string,
  policyPath: string | undefined = process.env.GATEWAY_POLICY_PATH,
): Promise<CliResult> {
  if (!command || !COMMANDS.includes(command)) {
    return { code: 1, output: `Usage: gateway-cli <${COMMANDS.join("|")}>` };
  }
  const resolved = policyPath ? path.resolve(policyPath) : undefined;

  try {
    if (command === "validate-policy") {
      const policy = loadPolicy(resolved);
      return { code: 0, output: JSON.stringify({ ok: true, policy_id: policy.policy_id }) };
    }

    const data: unknown = input.trim() ? JSON.parse(input) : {};
    if (command === "decide") {
      // Audit lines go to stderr so stdout carries only the decision.
      const enforcer = Enforcer.fromFile(resolved, { sink: new ConsoleAuditSink(process.stderr) });
      const decision = await enforcer.decide(parseToolCall(data));
      return { code: decision.allowed ? 0 : 2, output: JSON.stringify(decision) };
    }

    const options = resolved ? loadPolicy(resolved).redact : DEFAULT_REDACT_OPTIONS;
    return { code: 0, output: JSON.stringify(redactValue(data, options).redacted) };
  } catch (err: unknown) {
    const error = buildPublicError(err, "command failed", "cli_error");
    const errors = err instanceof ConfigurationError ? err.errors : [error.message];
    return { code: 1, output: JSON.stringify({ ok: false, code: error.code, errors }) };
  }
}

async function main(): Promise<void> {
  const command = process.argv[2];
  const input = command && command !== "validate-policy" ? await readStdin() : "";
  const result = await runCli(command, input);
  if (result.code === 1) {
    console.error(result.output);
  } else {
    console.log(result.output);
  }
  process.exitCode = result.code;
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error("Error:", err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
}
