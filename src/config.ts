import { z } from "zod"

export type LlmProviderName = "openai" | "ollama"

export interface ScoringPolicy {
  nameWeight: number
  notesWeight: number
  repetitionWeight: number
}

export interface ModelSettings {
  provider: LlmProviderName
  agentModel: string
  judgeModel: string
  openaiApiKey: string
  ollamaBaseUrl: string
  timeoutMs: number
}

export interface AppConfig {
  port: number
  host: string
  dbPath: string
  logDir: string
  guardrailDefault: boolean
  decisionLogLimit: number
  model: ModelSettings
  scoring: ScoringPolicy
}

export const defaultScoringPolicy: ScoringPolicy = {
  nameWeight: 2,
  notesWeight: 1,
  repetitionWeight: 0.5,
}

const EnvSchema = z.object({
  PORT: z.string().optional(),
  HOST: z.string().optional(),
  RAGGUARD_DB_PATH: z.string().default("./data/vendor-rag-guard.db"),
  RAGGUARD_LOG_DIR: z.string().default("./data/logs"),
  RAGGUARD_GUARDRAIL_DEFAULT: z.string().optional(),
  RAGGUARD_DECISION_LOG_LIMIT: z.string().optional(),
  RAGGUARD_LLM_PROVIDER: z.enum(["openai", "ollama"]).default("ollama"),
  RAGGUARD_AGENT_MODEL: z.string().default("llama3:8b"),
  RAGGUARD_JUDGE_MODEL: z.string().default("llama3:8b"),
  RAGGUARD_OPENAI_API_KEY: z.string().default(""),
  RAGGUARD_OLLAMA_BASE_URL: z.string().default("http://localhost:11434/api"),
  RAGGUARD_MODEL_TIMEOUT_MS: z.string().optional(),
  RAGGUARD_NAME_WEIGHT: z.string().optional(),
  RAGGUARD_NOTES_WEIGHT: z.string().optional(),
  RAGGUARD_REPETITION_WEIGHT: z.string().optional(),
})

function toBoolean(input: string | undefined, defaultValue: boolean): boolean {
  if (input === undefined) {
    return defaultValue
  }

  const normalized = input.trim().toLowerCase()
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true
  }

  if (["0", "false", "no", "off"].includes(normalized)) {
    return false
  }

  return defaultValue
}

function toInteger(input: string | undefined, defaultValue: number): number {
  if (!input) {
    return defaultValue
  }

  const parsed = Number.parseInt(input, 10)
  if (Number.isNaN(parsed)) {
    return defaultValue
  }

  return parsed
}

function toMinInteger(input: string | undefined, defaultValue: number, min: number): number {
  const parsed = toInteger(input, defaultValue)
  return parsed < min ? min : parsed
}

// Weights are non-negative reals; anything else keeps the default.
function toWeight(input: string | undefined, defaultValue: number): number {
  if (!input) {
    return defaultValue
  }

  const parsed = Number.parseFloat(input)
  if (!Number.isFinite(parsed) || parsed < 0) {
    return defaultValue
  }

  return parsed
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.parse(env)

  return {
    port: toInteger(parsed.PORT, 3000),
    host: parsed.HOST ?? "0.0.0.0",
    dbPath: parsed.RAGGUARD_DB_PATH,
    logDir: parsed.RAGGUARD_LOG_DIR,
    guardrailDefault: toBoolean(parsed.RAGGUARD_GUARDRAIL_DEFAULT, false),
    decisionLogLimit: toMinInteger(parsed.RAGGUARD_DECISION_LOG_LIMIT, 50, 1),
    model: {
      provider: parsed.RAGGUARD_LLM_PROVIDER,
      agentModel: parsed.RAGGUARD_AGENT_MODEL,
      judgeModel: parsed.RAGGUARD_JUDGE_MODEL,
      openaiApiKey: parsed.RAGGUARD_OPENAI_API_KEY,
      ollamaBaseUrl: parsed.RAGGUARD_OLLAMA_BASE_URL,
      timeoutMs: toMinInteger(parsed.RAGGUARD_MODEL_TIMEOUT_MS, 20_000, 1_000),
    },
    scoring: {
      nameWeight: toWeight(parsed.RAGGUARD_NAME_WEIGHT, defaultScoringPolicy.nameWeight),
      notesWeight: toWeight(parsed.RAGGUARD_NOTES_WEIGHT, defaultScoringPolicy.notesWeight),
      repetitionWeight: toWeight(
        parsed.RAGGUARD_REPETITION_WEIGHT,
        defaultScoringPolicy.repetitionWeight,
      ),
    },
  }
}
