import { jsonResponse, readIntegerParam } from "../lib/http"
import type { ServerContext } from "../server-context"
import { toDecisionLogResponse } from "./serializers"
import { storeErrorResponse } from "./vendors"

export async function handleListDecisions(request: Request, ctx: ServerContext): Promise<Response> {
  const limit = readIntegerParam(request, "limit", ctx.config.decisionLogLimit, { min: 1, max: 500 })

  try {
    const decisions = await ctx.db.listDecisions(limit)

    return jsonResponse({
      decisions: decisions.map(toDecisionLogResponse),
      meta: {
        limit,
        total_returned: decisions.length,
      },
    })
  } catch (error) {
    ctx.loggers.app.error({ error }, "decision listing failed")
    return storeErrorResponse(error)
  }
}
