import { errorResponse } from "./lib/http"
import { handleListDecisions } from "./routes/decisions"
import { handleHealthz } from "./routes/healthz"
import { handlePayment } from "./routes/payments"
import { handleReadyz } from "./routes/readyz"
import { handleSearch } from "./routes/search"
import { handleInsertVendor, handleListVendors } from "./routes/vendors"
import type { ServerContext } from "./server-context"

type Handler = (request: Request, ctx: ServerContext) => Response | Promise<Response>

const routes: Record<string, Partial<Record<string, Handler>>> = {
  "/healthz": { GET: handleHealthz },
  "/readyz": { GET: handleReadyz },
  "/v1/vendors": { GET: handleListVendors, POST: handleInsertVendor },
  "/v1/search": { POST: handleSearch },
  "/v1/payments": { POST: handlePayment },
  "/v1/decisions": { GET: handleListDecisions },
}

export function createFetchHandler(ctx: ServerContext): (request: Request) => Promise<Response> {
  return async (request) => {
    const started = Date.now()
    const { pathname } = new URL(request.url)

    let response: Response
    const methods = routes[pathname]

    if (!methods) {
      response = errorResponse(404, "Route not found")
    } else {
      const handler = methods[request.method]
      response = handler ? await handler(request, ctx) : errorResponse(405, "Method not allowed")
    }

    ctx.loggers.app.info(
      {
        method: request.method,
        pathname,
        status: response.status,
        durationMs: Date.now() - started,
      },
      "http request",
    )

    return response
  }
}
