import { createOpenAI } from "@ai-sdk/openai"
import { generateText, type LanguageModel } from "ai"
import { createOllama } from "ollama-ai-provider"
import type { ModelSettings } from "../config"

export interface CompletionRequest {
  system: string
  prompt: string
}

export interface CompletionProvider {
  readonly modelId: string
  complete(request: CompletionRequest & { signal: AbortSignal }): Promise<string>
}

export class ModelTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Model call timed out after ${timeoutMs}ms`)
    this.name = "ModelTimeoutError"
  }
}

export class ModelUnavailableError extends Error {
  constructor(cause: unknown) {
    super(`Model call failed: ${describeError(cause)}`, { cause })
    this.name = "ModelUnavailableError"
  }
}

export type ModelOutcome =
  | { ok: true; text: string }
  | { ok: false; error: ModelTimeoutError | ModelUnavailableError }

/**
 * Runs one completion with a bounded timeout and no retry.
 *
 * Never rejects: a timeout or transport failure comes back as a failed
 * outcome so callers can branch on it.
 */
export async function invokeModel(
  provider: CompletionProvider,
  request: CompletionRequest,
  timeoutMs: number,
): Promise<ModelOutcome> {
  const controller = new AbortController()
  let timer: NodeJS.Timeout | undefined

  const timeout = new Promise<ModelOutcome>((resolve) => {
    timer = setTimeout(() => {
      controller.abort()
      resolve({ ok: false, error: new ModelTimeoutError(timeoutMs) })
    }, timeoutMs)
  })

  // A provider that throws synchronously lands in the catch below as well.
  const completion = Promise.resolve()
    .then(() => provider.complete({ ...request, signal: controller.signal }))
    .then((text): ModelOutcome => ({ ok: true, text }))

  try {
    return await Promise.race([completion, timeout])
  } catch (error) {
    if (controller.signal.aborted) {
      return { ok: false, error: new ModelTimeoutError(timeoutMs) }
    }
    return { ok: false, error: new ModelUnavailableError(error) }
  } finally {
    clearTimeout(timer)
  }
}

export class AiSdkCompletionProvider implements CompletionProvider {
  constructor(
    private readonly settings: ModelSettings,
    readonly modelId: string,
  ) {}

  async complete(request: CompletionRequest & { signal: AbortSignal }): Promise<string> {
    const result = await generateText({
      model: this.getModel(),
      system: request.system,
      prompt: request.prompt,
      temperature: 0,
      maxRetries: 0,
      abortSignal: request.signal,
    })

    return result.text
  }

  private getModel(): LanguageModel {
    if (this.settings.provider === "ollama") {
      const provider = createOllama({
        baseURL: this.settings.ollamaBaseUrl,
      })

      return provider(this.modelId)
    }

    if (!this.settings.openaiApiKey) {
      throw new Error("RAGGUARD_OPENAI_API_KEY required when RAGGUARD_LLM_PROVIDER=openai")
    }

    const provider = createOpenAI({
      apiKey: this.settings.openaiApiKey,
    })

    return provider(this.modelId)
  }
}

export function isProviderConfigured(settings: ModelSettings): boolean {
  if (settings.provider === "openai") {
    return Boolean(settings.openaiApiKey)
  }

  try {
    const parsed = new URL(settings.ollamaBaseUrl)
    return parsed.protocol === "http:" || parsed.protocol === "https:"
  } catch {
    return false
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
