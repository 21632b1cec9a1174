import { z } from "zod"
import { errorResponse, jsonResponse, readJsonBody } from "../lib/http"
import type { ServerContext } from "../server-context"
import { toCandidateResponse } from "./serializers"
import { storeErrorResponse } from "./vendors"

const SearchRequestSchema = z.object({
  query: z.string().min(1).max(500),
  count: z.number().int().min(1).max(50).default(10),
})

export async function handleSearch(request: Request, ctx: ServerContext): Promise<Response> {
  const payload = await readJsonBody(request)
  const parsed = SearchRequestSchema.safeParse(payload)

  if (!parsed.success) {
    return errorResponse(400, "Invalid search payload", parsed.error.flatten())
  }

  try {
    const candidates = await ctx.orchestrator.preview(parsed.data.query)
    const results = candidates.slice(0, parsed.data.count).map(toCandidateResponse)

    return jsonResponse({
      query: parsed.data.query,
      results,
      meta: {
        total_matched: candidates.length,
        total_returned: results.length,
      },
    })
  } catch (error) {
    ctx.loggers.app.error({ error }, "search preview failed")
    return storeErrorResponse(error)
  }
}
