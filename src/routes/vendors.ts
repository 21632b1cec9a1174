import { z } from "zod"
import { findDuplicateNames, StoreUnavailableError } from "../db"
import { errorResponse, jsonResponse, readJsonBody } from "../lib/http"
import type { ServerContext } from "../server-context"
import { toVendorResponse } from "./serializers"

const InsertVendorSchema = z.object({
  name: z.string().trim().min(1).max(200),
  account_id: z.string().trim().min(1).max(100),
  notes: z.string().max(10_000).default(""),
})

export async function handleListVendors(_request: Request, ctx: ServerContext): Promise<Response> {
  try {
    const vendors = await ctx.db.all()

    return jsonResponse({
      vendors: vendors.map(toVendorResponse),
      meta: {
        total: vendors.length,
        duplicate_names: findDuplicateNames(vendors),
      },
    })
  } catch (error) {
    ctx.loggers.app.error({ error }, "vendor listing failed")
    return storeErrorResponse(error)
  }
}

export async function handleInsertVendor(request: Request, ctx: ServerContext): Promise<Response> {
  const payload = await readJsonBody(request)
  const parsed = InsertVendorSchema.safeParse(payload)

  if (!parsed.success) {
    return errorResponse(400, "Invalid vendor payload", parsed.error.flatten())
  }

  try {
    const id = await ctx.orchestrator.insertVendor(
      parsed.data.name,
      parsed.data.account_id,
      parsed.data.notes,
    )

    return jsonResponse({ id }, 201)
  } catch (error) {
    ctx.loggers.app.error({ error }, "vendor insert failed")
    return storeErrorResponse(error)
  }
}

export function storeErrorResponse(error: unknown): Response {
  if (error instanceof StoreUnavailableError) {
    return errorResponse(503, "Vendor store unavailable")
  }
  return errorResponse(500, "Internal error")
}
