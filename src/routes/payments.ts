import { z } from "zod"
import { errorResponse, jsonResponse, readJsonBody } from "../lib/http"
import type { ServerContext } from "../server-context"
import { toDecisionResponse } from "./serializers"
import { storeErrorResponse } from "./vendors"

const PaymentRequestSchema = z.object({
  query: z.string().trim().min(1).max(1_000),
  guardrail: z.boolean().optional(),
})

export async function handlePayment(request: Request, ctx: ServerContext): Promise<Response> {
  const start = Date.now()
  const payload = await readJsonBody(request)
  const parsed = PaymentRequestSchema.safeParse(payload)

  if (!parsed.success) {
    return errorResponse(400, "Invalid payment payload", parsed.error.flatten())
  }

  const guardrailEnabled = parsed.data.guardrail ?? ctx.config.guardrailDefault

  try {
    const decision = await ctx.orchestrator.runQuery(parsed.data.query, guardrailEnabled)

    ctx.loggers.app.info(
      {
        query: parsed.data.query,
        guardrailEnabled,
        outcome: decision.outcome,
        durationMs: Date.now() - start,
      },
      "payment request completed",
    )

    return jsonResponse({ decision: toDecisionResponse(decision) })
  } catch (error) {
    ctx.loggers.app.error({ error, query: parsed.data.query }, "payment request failed")
    return storeErrorResponse(error)
  }
}
