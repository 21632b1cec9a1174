import { mkdirSync } from "node:fs"
import { dirname } from "node:path"
import { createClient, type Client, type InValue } from "@libsql/client"
import { z } from "zod"
import type {
  AgentDecision,
  DecisionLogEntry,
  SearchEventInput,
  TraceEntry,
  VendorInput,
  VendorRecord,
} from "./types"

export class StoreUnavailableError extends Error {
  constructor(
    readonly operation: string,
    cause: unknown,
  ) {
    super(`Vendor store unavailable during ${operation}`, { cause })
    this.name = "StoreUnavailableError"
  }
}

export interface VendorStore {
  insert(input: VendorInput): Promise<number>
  all(): Promise<VendorRecord[]>
  get(id: number): Promise<VendorRecord | null>
}

const VendorRowSchema = z.object({
  id: z.number(),
  name: z.string(),
  account_id: z.string(),
  notes: z.string(),
  created_at: z.number(),
})

type VendorRow = z.infer<typeof VendorRowSchema>

const DecisionRowSchema = z.object({
  id: z.number(),
  query: z.string(),
  guardrail_enabled: z.number(),
  outcome: z.enum(["PAYMENT_APPROVED", "PAYMENT_DENIED"]),
  account_id: z.string().nullable(),
  vendor_name: z.string().nullable(),
  amount: z.number().nullable(),
  reason: z.string().nullable(),
  narrative: z.string(),
  trace_json: z.string(),
  created_at: z.number(),
})

const TraceSchema = z.array(
  z.discriminatedUnion("state", [
    z.object({
      state: z.literal("RETRIEVED"),
      candidateCount: z.number(),
      topVendorId: z.number().nullable(),
    }),
    z.object({
      state: z.literal("JUDGED"),
      vendorId: z.number(),
      accountId: z.string(),
      verdict: z.enum(["SAFE", "UNSAFE"]),
      rationale: z.string().optional(),
    }),
    z.object({
      state: z.literal("DECIDED"),
      outcome: z.enum(["PAYMENT_APPROVED", "PAYMENT_DENIED"]),
      vendorId: z.number().nullable(),
    }),
  ]),
)

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS vendors (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    account_id TEXT NOT NULL,
    notes TEXT NOT NULL,
    created_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS search_events (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    query TEXT NOT NULL,
    result_count INTEGER NOT NULL,
    top_vendor_id INTEGER,
    scores_json TEXT NOT NULL,
    created_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS decisions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    query TEXT NOT NULL,
    guardrail_enabled INTEGER NOT NULL,
    outcome TEXT NOT NULL,
    account_id TEXT,
    vendor_name TEXT,
    amount REAL,
    reason TEXT,
    narrative TEXT NOT NULL,
    trace_json TEXT NOT NULL,
    created_at INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_decisions_created_at ON decisions(created_at);
`

export class AppDb implements VendorStore {
  private constructor(private readonly client: Client) {}

  /**
   * Opens (and migrates) the database at `path`. `:memory:` gives a private
   * in-process database.
   */
  static async open(path: string): Promise<AppDb> {
    const inMemory = path === ":memory:"
    if (!inMemory) {
      mkdirSync(dirname(path), { recursive: true })
    }

    const db = new AppDb(createClient({ url: inMemory ? ":memory:" : `file:${path}` }))
    if (!inMemory) {
      await db.client.execute("PRAGMA journal_mode = WAL")
    }
    await db.client.executeMultiple(SCHEMA_SQL)
    return db
  }

  insert(input: VendorInput): Promise<number> {
    return this.guard("insert", () =>
      this.run(`INSERT INTO vendors (name, account_id, notes, created_at) VALUES (?, ?, ?, ?)`, [
        input.name,
        input.accountId,
        input.notes,
        Date.now(),
      ]),
    )
  }

  all(): Promise<VendorRecord[]> {
    return this.guard("all", async () => {
      const result = await this.client.execute(
        `SELECT id, name, account_id, notes, created_at FROM vendors ORDER BY id ASC`,
      )
      return result.rows.map((row) => toVendorRecord(VendorRowSchema.parse(row)))
    })
  }

  get(id: number): Promise<VendorRecord | null> {
    return this.guard("get", async () => {
      const result = await this.client.execute({
        sql: `SELECT id, name, account_id, notes, created_at FROM vendors WHERE id = ?`,
        args: [id],
      })
      const row = result.rows[0]
      return row ? toVendorRecord(VendorRowSchema.parse(row)) : null
    })
  }

  clearVendors(): Promise<void> {
    return this.guard("clear", () =>
      this.client.executeMultiple(
        `DELETE FROM vendors; DELETE FROM sqlite_sequence WHERE name = 'vendors';`,
      ),
    )
  }

  async storeSearchEvent(event: SearchEventInput): Promise<void> {
    const scores = event.candidates.map((candidate) => ({
      vendor_id: candidate.record.id,
      vendor: candidate.record.name,
      score: candidate.score,
      breakdown: candidate.breakdown,
    }))

    await this.guard("storeSearchEvent", () =>
      this.run(
        `
          INSERT INTO search_events (query, result_count, top_vendor_id, scores_json, created_at)
          VALUES (?, ?, ?, ?, ?)
        `,
        [
          event.query,
          event.candidates.length,
          event.candidates[0]?.record.id ?? null,
          JSON.stringify(scores),
          Date.now(),
        ],
      ),
    )
  }

  storeDecision(decision: AgentDecision): Promise<number> {
    return this.guard("storeDecision", () =>
      this.run(
        `
          INSERT INTO decisions (
            query, guardrail_enabled, outcome, account_id, vendor_name, amount, reason,
            narrative, trace_json, created_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        `,
        [
          decision.query,
          decision.guardrailEnabled ? 1 : 0,
          decision.outcome,
          decision.outcome === "PAYMENT_APPROVED" ? decision.accountId : null,
          decision.vendorName,
          decision.amount,
          decision.outcome === "PAYMENT_DENIED" ? decision.reason : null,
          decision.narrative,
          JSON.stringify(decision.trace),
          Date.now(),
        ],
      ),
    )
  }

  listDecisions(limit: number): Promise<DecisionLogEntry[]> {
    return this.guard("listDecisions", async () => {
      const result = await this.client.execute({
        sql: `
          SELECT
            id, query, guardrail_enabled, outcome, account_id, vendor_name, amount, reason,
            narrative, trace_json, created_at
          FROM decisions
          ORDER BY id DESC
          LIMIT ?
        `,
        args: [limit],
      })

      return result.rows.map((raw) => {
        const row = DecisionRowSchema.parse(raw)
        return {
          id: row.id,
          query: row.query,
          guardrailEnabled: row.guardrail_enabled === 1,
          outcome: row.outcome,
          accountId: row.account_id,
          vendorName: row.vendor_name,
          amount: row.amount,
          reason: row.reason,
          narrative: row.narrative,
          trace: parseTrace(row.trace_json),
          createdAt: row.created_at,
        }
      })
    })
  }

  async isHealthy(): Promise<boolean> {
    try {
      await this.client.execute(`SELECT 1`)
      return true
    } catch {
      return false
    }
  }

  close(): void {
    if (!this.client.closed) {
      this.client.close()
    }
  }

  // Runs an INSERT and returns the new row id.
  private async run(sql: string, args: InValue[]): Promise<number> {
    const result = await this.client.execute({ sql, args })
    if (result.lastInsertRowid === undefined) {
      throw new Error("insert returned no row id")
    }
    return Number(result.lastInsertRowid)
  }

  private async guard<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run()
    } catch (error) {
      throw new StoreUnavailableError(operation, error)
    }
  }
}

// Names that occur more than once, compared case- and whitespace-insensitively.
export function findDuplicateNames(records: VendorRecord[]): string[] {
  const counts = new Map<string, { name: string; count: number }>()

  for (const record of records) {
    const key = record.name.trim().toLowerCase()
    const entry = counts.get(key)
    if (entry) {
      entry.count += 1
    } else {
      counts.set(key, { name: record.name.trim(), count: 1 })
    }
  }

  return [...counts.values()].filter((entry) => entry.count > 1).map((entry) => entry.name)
}

function toVendorRecord(row: VendorRow): VendorRecord {
  return {
    id: row.id,
    name: row.name,
    accountId: row.account_id,
    notes: row.notes,
    createdAt: row.created_at,
  }
}

function parseTrace(json: string): TraceEntry[] {
  let raw: unknown
  try {
    raw = JSON.parse(json)
  } catch {
    return []
  }

  const parsed = TraceSchema.safeParse(raw)
  return parsed.success ? parsed.data : []
}
