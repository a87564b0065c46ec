import express from "express";
import type { NextFunction, Request, Response } from "express";

import { Enforcer } from "./enforcer";
import { InvalidToolCallError, buildPublicError } from "./errors";
import { parseToolCall } from "./tool_call";
import type { Decision, ToolCall } from "./types";
import { isRecord } from "./util";

export type GateResponse = {
  status: number;
  body: { allowed: boolean; decision?: Decision; error?: { message: string; code: string } };
};

/**
 * Decision endpoint for agent hosts that execute tools themselves: the gate
 * runs every pre-execution layer and audits the verdict, but never runs a tool.
 */
export async function handleDecide(enforcer: Enforcer, body: unknown): Promise<GateResponse> {
  let call: ToolCall;
  try {
    call = parseToolCall(body);
  } catch (err: unknown) {
    if (err instanceof InvalidToolCallError) {
      return {
        status: 400,
        body: { allowed: false, error: buildPublicError(err, "invalid tool call", "invalid_tool_call") },
      };
    }
    throw err;
  }

  const decision = await enforcer.decide(call);
  if (decision.allowed) {
    return { status: 200, body: { allowed: true, decision } };
  }
  return { status: decision.layer === "rate_limit" ? 429 : 403, body: { allowed: false, decision } };
}

export function createGateApp(enforcer: Enforcer): express.Express {
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => res.json({ ok: true, policy_id: enforcer.policy.policy_id }));

  app.post("/decide", (req, res, next) => {
    handleDecide(enforcer, req.body)
      .then((response) => res.status(response.status).json(response.body))
      .catch(next);
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isRecord(err) && err.type === "entity.parse.failed") {
      res.status(400).json({ allowed: false, error: { message: "malformed JSON body", code: "invalid_tool_call" } });
      return;
    }
    console.error("gate request failed:", err instanceof Error ? err.message : String(err));
    res.status(500).json({ allowed: false, error: buildPublicError(err, "internal error", "internal_error") });
  });

  return app;
}

if (require.main === module) {
  const enforcer = Enforcer.fromFile();
  const port = Number(process.env.GATEWAY_PORT ?? 9000);
  createGateApp(enforcer).listen(port, () => {
    console.log(`Gateway listening on http://localhost:${port} (policy ${enforcer.policy.policy_id})`);
  });
}
