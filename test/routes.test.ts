import { afterEach, describe, expect, test } from "vitest"
import { loadConfig } from "../src/config"
import { AppDb } from "../src/db"
import { createFetchHandler } from "../src/router"
import type { ServerContext } from "../src/server-context"
import { GuardrailJudge } from "../src/services/llm-judge"
import { PaymentAgent } from "../src/services/payment-agent"
import { PaymentOrchestrator } from "../src/services/payment-orchestrator"
import { createAgentStub, createJudgeStub, legitVendor, poisonedVendor, testLoggers } from "./helpers"

const openDbs: AppDb[] = []

afterEach(() => {
  for (const db of openDbs.splice(0)) {
    db.close()
  }
})

async function createContext(env: Record<string, string> = {}): Promise<ServerContext> {
  const config = loadConfig(env)
  const loggers = testLoggers()
  const db = await AppDb.open(":memory:")
  openDbs.push(db)

  const orchestrator = new PaymentOrchestrator({
    store: db,
    judge: new GuardrailJudge(createJudgeStub(), 1_000, loggers.security),
    agent: new PaymentAgent(createAgentStub(), 1_000, loggers.app),
    loggers,
    recorder: db,
    scoring: config.scoring,
  })

  return { config, db, loggers, orchestrator }
}

function post(path: string, body: unknown): Request {
  return new Request(`http://localhost${path}`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  })
}

function get(path: string): Request {
  return new Request(`http://localhost${path}`)
}

async function seedAttack(handler: (request: Request) => Promise<Response>): Promise<void> {
  for (const vendor of [legitVendor, poisonedVendor]) {
    await handler(
      post("/v1/vendors", { name: vendor.name, account_id: vendor.accountId, notes: vendor.notes }),
    )
  }
}

describe("http routes", () => {
  test("/healthz reports configuration", async () => {
    const handler = createFetchHandler(await createContext())

    const response = await handler(get("/healthz"))
    const payload = (await response.json()) as { status: string; checks: Record<string, unknown> }

    expect(response.status).toBe(200)
    expect(payload.status).toBe("ok")
    expect(payload.checks.llm_provider).toBe("ollama")
    expect(payload.checks.guardrail_default).toBe(false)
  })

  test("/readyz fails when the store is gone", async () => {
    const ctx = await createContext()
    const handler = createFetchHandler(ctx)

    expect((await handler(get("/readyz"))).status).toBe(200)

    ctx.db.close()
    const response = await handler(get("/readyz"))
    const payload = (await response.json()) as { status: string }

    expect(response.status).toBe(503)
    expect(payload.status).toBe("not_ready")
  })

  test("/readyz fails for openai without an api key", async () => {
    const handler = createFetchHandler(await createContext({ RAGGUARD_LLM_PROVIDER: "openai" }))

    const response = await handler(get("/readyz"))

    expect(response.status).toBe(503)
  })

  test("rejects an invalid vendor payload", async () => {
    const handler = createFetchHandler(await createContext())

    const response = await handler(post("/v1/vendors", { name: "", account_id: "X" }))
    const payload = (await response.json()) as { error?: { message?: string } }

    expect(response.status).toBe(400)
    expect(payload.error?.message).toBe("Invalid vendor payload")
  })

  test("inserts vendors and lists them with duplicate names", async () => {
    const handler = createFetchHandler(await createContext())

    const created = await handler(
      post("/v1/vendors", { name: "ABC Corp", account_id: "LEGIT-001", notes: "Standard vendor" }),
    )
    expect(created.status).toBe(201)
    expect(await created.json()).toEqual({ id: 1 })

    await handler(post("/v1/vendors", { name: "ABC Corp", account_id: "ATTACKER-999" }))

    const response = await handler(get("/v1/vendors"))
    const payload = (await response.json()) as {
      vendors: Array<{ id: number; account_id: string; notes: string }>
      meta: { total: number; duplicate_names: string[] }
    }

    expect(payload.vendors.map((vendor) => [vendor.id, vendor.account_id, vendor.notes])).toEqual([
      [1, "LEGIT-001", "Standard vendor"],
      [2, "ATTACKER-999", ""],
    ])
    expect(payload.meta).toEqual({ total: 2, duplicate_names: ["ABC Corp"] })
  })

  test("search previews the ranking with score breakdowns", async () => {
    const handler = createFetchHandler(await createContext())
    await seedAttack(handler)

    const response = await handler(post("/v1/search", { query: "Please pay ABC Corp" }))
    const payload = (await response.json()) as {
      results: Array<{
        rank: number
        score: number
        vendor: { account_id: string }
        breakdown: { name_matches: string[]; notes_matches: string[]; repetition_bonus: number }
      }>
      meta: { total_matched: number; total_returned: number }
    }

    expect(response.status).toBe(200)
    expect(payload.results.map((result) => [result.rank, result.vendor.account_id, result.score])).toEqual([
      [1, "ATTACKER-999", 9],
      [2, "LEGIT-001", 4],
    ])
    expect(payload.results[0]?.breakdown).toEqual({
      name_matches: ["abc", "corp"],
      notes_matches: ["pay", "abc", "corp"],
      repetition_bonus: 2,
    })
    expect(payload.meta).toEqual({ total_matched: 2, total_returned: 2 })
  })

  test("payments follow the poisoned record when the guardrail is off by default", async () => {
    const handler = createFetchHandler(await createContext())
    await seedAttack(handler)

    const response = await handler(post("/v1/payments", { query: "Please pay ABC Corp" }))
    const payload = (await response.json()) as {
      decision: { outcome: string; account_id: string | null; guardrail_enabled: boolean }
    }

    expect(response.status).toBe(200)
    expect(payload.decision.outcome).toBe("PAYMENT_APPROVED")
    expect(payload.decision.account_id).toBe("ATTACKER-999")
    expect(payload.decision.guardrail_enabled).toBe(false)
  })

  test("payments with the guardrail pay the legitimate account", async () => {
    const handler = createFetchHandler(await createContext())
    await seedAttack(handler)

    const response = await handler(
      post("/v1/payments", { query: "Please pay ABC Corp", guardrail: true }),
    )
    const payload = (await response.json()) as {
      decision: { outcome: string; account_id: string | null; reason: string | null }
    }

    expect(payload.decision).toMatchObject({
      outcome: "PAYMENT_APPROVED",
      account_id: "LEGIT-001",
      reason: null,
    })
  })

  test("the guardrail default comes from configuration", async () => {
    const handler = createFetchHandler(await createContext({ RAGGUARD_GUARDRAIL_DEFAULT: "true" }))
    await seedAttack(handler)

    const response = await handler(post("/v1/payments", { query: "Please pay ABC Corp" }))
    const payload = (await response.json()) as { decision: { account_id: string | null } }

    expect(payload.decision.account_id).toBe("LEGIT-001")
  })

  test("decisions are listed newest first", async () => {
    const handler = createFetchHandler(await createContext())
    await seedAttack(handler)
    await handler(post("/v1/payments", { query: "Please pay ABC Corp", guardrail: false }))
    await handler(post("/v1/payments", { query: "Please pay $500 to ABC Corp", guardrail: true }))

    const response = await handler(get("/v1/decisions?limit=1"))
    const payload = (await response.json()) as {
      decisions: Array<{ account_id: string | null; amount: number | null; query: string }>
      meta: { limit: number; total_returned: number }
    }

    expect(payload.meta).toEqual({ limit: 1, total_returned: 1 })
    expect(payload.decisions[0]).toMatchObject({
      query: "Please pay $500 to ABC Corp",
      account_id: "LEGIT-001",
      amount: 500,
    })
  })

  test("payments report an unavailable store", async () => {
    const ctx = await createContext()
    const handler = createFetchHandler(ctx)
    ctx.db.close()

    const response = await handler(post("/v1/payments", { query: "Please pay ABC Corp" }))
    const payload = (await response.json()) as { error?: { message?: string } }

    expect(response.status).toBe(503)
    expect(payload.error?.message).toBe("Vendor store unavailable")
  })

  test("unknown routes and methods", async () => {
    const handler = createFetchHandler(await createContext())

    expect((await handler(get("/nope"))).status).toBe(404)
    expect((await handler(new Request("http://localhost/v1/vendors", { method: "DELETE" }))).status).toBe(405)
    expect((await handler(get("/v1/payments"))).status).toBe(405)
  })
})
