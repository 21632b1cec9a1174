import { defaultScoringPolicy, type ScoringPolicy } from "../config"
import { findDuplicateNames, type VendorStore } from "../db"
import { parsePaymentAmount } from "../lib/amount"
import type { Loggers } from "../logger"
import type {
  AgentDecision,
  Candidate,
  JudgeVerdict,
  OrchestratorState,
  SearchEventInput,
  TraceEntry,
  VendorInput,
} from "../types"
import type { AgentResult } from "./payment-agent"
import { search } from "./retriever"

export interface VerdictClassifier {
  classify(candidate: Candidate): Promise<JudgeVerdict>
}

export interface DecisionMaker {
  decide(query: string, candidate: Candidate | null): Promise<AgentResult>
}

export interface DecisionRecorder {
  storeSearchEvent(event: SearchEventInput): Promise<void>
  storeDecision(decision: AgentDecision): Promise<number>
}

interface PaymentOrchestratorDependencies {
  store: VendorStore
  judge: VerdictClassifier
  agent: DecisionMaker
  loggers: Loggers
  recorder?: DecisionRecorder
  scoring?: ScoringPolicy
}

const transitions: Record<OrchestratorState, OrchestratorState[]> = {
  IDLE: ["RETRIEVED"],
  RETRIEVED: ["JUDGED", "DECIDED"],
  JUDGED: ["JUDGED", "DECIDED"],
  DECIDED: [],
}

export class InvalidTransitionError extends Error {
  constructor(
    readonly from: OrchestratorState,
    readonly to: OrchestratorState,
  ) {
    super(`Invalid orchestrator transition ${from} -> ${to}`)
    this.name = "InvalidTransitionError"
  }
}

class QueryRun {
  state: OrchestratorState = "IDLE"
  readonly trace: TraceEntry[] = []

  advance(entry: TraceEntry): void {
    if (!transitions[this.state].includes(entry.state)) {
      throw new InvalidTransitionError(this.state, entry.state)
    }
    this.state = entry.state
    this.trace.push(entry)
  }
}

export class PaymentOrchestrator {
  private tail: Promise<unknown> = Promise.resolve()

  constructor(private readonly dependencies: PaymentOrchestratorDependencies) {}

  runQuery(query: string, guardrailEnabled: boolean): Promise<AgentDecision> {
    return this.serialize(() => this.execute(query, guardrailEnabled))
  }

  insertVendor(name: string, accountId: string, notes: string): Promise<number> {
    return this.serialize(() => this.insert({ name, accountId, notes }))
  }

  async preview(query: string): Promise<Candidate[]> {
    const { store, scoring } = this.dependencies
    return search(query, await store.all(), scoring ?? defaultScoringPolicy)
  }

  private async execute(query: string, guardrailEnabled: boolean): Promise<AgentDecision> {
    const { store, judge, agent, loggers, recorder, scoring } = this.dependencies
    const run = new QueryRun()

    const candidates = search(query, await store.all(), scoring ?? defaultScoringPolicy)
    run.advance({
      state: "RETRIEVED",
      candidateCount: candidates.length,
      topVendorId: candidates[0]?.record.id ?? null,
    })
    await recorder?.storeSearchEvent({ query, candidates })

    loggers.app.info(
      {
        query,
        candidateCount: candidates.length,
        scores: candidates.map((candidate) => ({
          vendorId: candidate.record.id,
          score: candidate.score,
        })),
      },
      "vendor retrieval completed",
    )

    let selected: Candidate | null = candidates[0] ?? null

    if (guardrailEnabled) {
      selected = null
      for (const candidate of candidates) {
        const verdict = await judge.classify(candidate)
        run.advance({
          state: "JUDGED",
          vendorId: candidate.record.id,
          accountId: candidate.record.accountId,
          verdict: verdict.verdict,
          rationale: verdict.rationale,
        })

        if (verdict.verdict === "SAFE") {
          selected = candidate
          break
        }

        loggers.security.warn(
          {
            query,
            vendorId: candidate.record.id,
            vendorName: candidate.record.name,
            accountId: candidate.record.accountId,
            rationale: verdict.rationale,
          },
          "guardrail discarded retrieved vendor record",
        )
      }
    }

    const result = await agent.decide(query, selected)
    run.advance({
      state: "DECIDED",
      outcome: result.verdict.outcome,
      vendorId: selected?.record.id ?? null,
    })

    const base = {
      query,
      guardrailEnabled,
      vendorName: selected?.record.name ?? null,
      vendorId: selected?.record.id ?? null,
      amount: parsePaymentAmount(query),
      narrative: result.narrative,
      trace: run.trace,
    }

    const decision: AgentDecision =
      result.verdict.outcome === "PAYMENT_APPROVED"
        ? { ...base, outcome: "PAYMENT_APPROVED", accountId: result.verdict.accountId }
        : { ...base, outcome: "PAYMENT_DENIED", reason: result.verdict.reason }

    await recorder?.storeDecision(decision)

    if (decision.outcome === "PAYMENT_APPROVED") {
      loggers.security.info(
        {
          query,
          guardrailEnabled,
          vendorId: decision.vendorId,
          accountId: decision.accountId,
          amount: decision.amount,
        },
        "payment approved",
      )
    } else {
      loggers.app.info(
        { query, guardrailEnabled, vendorId: decision.vendorId, reason: decision.reason },
        "payment denied",
      )
    }

    return decision
  }

  private async insert(input: VendorInput): Promise<number> {
    const { store, loggers } = this.dependencies
    const id = await store.insert(input)

    loggers.security.info(
      { vendorId: id, vendorName: input.name, accountId: input.accountId },
      "vendor record inserted",
    )

    // The row is committed at this point; a failed scan only loses the warning.
    try {
      const key = input.name.trim().toLowerCase()
      const duplicates = findDuplicateNames(await store.all())
      if (duplicates.some((name) => name.toLowerCase() === key)) {
        loggers.security.warn(
          { vendorId: id, vendorName: input.name, duplicates },
          "vendor name now duplicated in store",
        )
      }
    } catch (error) {
      loggers.app.warn({ error, vendorId: id }, "duplicate vendor name check failed")
    }

    return id
  }

  // Queries and inserts run one at a time, in arrival order.
  private serialize<T>(task: () => Promise<T> | T): Promise<T> {
    const result = this.tail.then(task)
    this.tail = result.then(
      () => undefined,
      () => undefined,
    )
    return result
  }
}
