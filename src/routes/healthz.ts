import { jsonResponse } from "../lib/http"
import type { ServerContext } from "../server-context"

export function handleHealthz(_request: Request, ctx: ServerContext): Response {
  return jsonResponse({
    status: "ok",
    timestamp: new Date().toISOString(),
    checks: {
      llm_provider: ctx.config.model.provider,
      agent_model: ctx.config.model.agentModel,
      judge_model: ctx.config.model.judgeModel,
      guardrail_default: ctx.config.guardrailDefault,
      model_timeout_ms: ctx.config.model.timeoutMs,
    },
  })
}
