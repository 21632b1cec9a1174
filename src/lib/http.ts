export function jsonResponse(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: {
      "content-type": "application/json; charset=utf-8",
    },
  })
}

export function errorResponse(status: number, message: string, details?: unknown): Response {
  return jsonResponse(
    {
      error: {
        message,
        details,
      },
    },
    status,
  )
}

export async function readJsonBody(request: Request): Promise<unknown> {
  try {
    return await request.json()
  } catch {
    return null
  }
}

export function readIntegerParam(
  request: Request,
  name: string,
  defaultValue: number,
  bounds: { min: number; max: number },
): number {
  const raw = new URL(request.url).searchParams.get(name)
  if (raw === null) {
    return defaultValue
  }

  const parsed = Number.parseInt(raw, 10)
  if (Number.isNaN(parsed)) {
    return defaultValue
  }

  return Math.min(bounds.max, Math.max(bounds.min, parsed))
}
