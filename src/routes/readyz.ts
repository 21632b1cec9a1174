import { jsonResponse } from "../lib/http"
import type { ServerContext } from "../server-context"
import { isProviderConfigured } from "../services/model-client"

export async function handleReadyz(_request: Request, ctx: ServerContext): Promise<Response> {
  const dbReachable = await ctx.db.isHealthy()
  const providerConfigured = isProviderConfigured(ctx.config.model)

  const checks = {
    db_reachable: dbReachable,
    llm_provider: ctx.config.model.provider,
    llm_provider_configured: providerConfigured,
  }

  const ready = dbReachable && providerConfigured
  return jsonResponse(
    {
      status: ready ? "ready" : "not_ready",
      timestamp: new Date().toISOString(),
      checks,
    },
    ready ? 200 : 503,
  )
}
