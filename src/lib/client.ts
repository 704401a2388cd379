import { APICallError, generateText } from "ai"
import { createOpenRouter } from "@openrouter/ai-sdk-provider"
import type { TokenLimitParam } from "../config/models"
import { RateLimitError, TransportError } from "./errors"

export type VisionRequest = {
  model: string
  prompt: string
  /** `data:<mime>;base64,<payload>` */
  imageDataUri: string
  tokenLimit: {
    param: TokenLimitParam
    value: number
  }
}

/**
 * One request/response call to a vision model. Implementations report HTTP 429 as
 * `RateLimitError` and every other failure as `TransportError`.
 */
export interface VisionClient {
  complete(request: VisionRequest): Promise<string>
}

export interface VisionClientHandle extends VisionClient {
  readonly released: boolean
  release(): void
}

export type OpenRouterClientConfig = {
  apiKey: string
  baseURL?: string
}

/**
 * Builds the single-turn multimodal message: prompt text first, then the inline image.
 */
export function buildMessages(request: VisionRequest) {
  return [
    {
      role: "user" as const,
      content: [
        { type: "text" as const, text: request.prompt },
        { type: "image" as const, image: request.imageDataUri },
      ],
    },
  ]
}

/**
 * Classifies an AI SDK failure at the transport boundary.
 */
export function toTransportFailure(err: unknown): RateLimitError | TransportError {
  if (APICallError.isInstance(err)) {
    const detail = [err.message, err.responseBody].filter(Boolean).join(" ")
    if (err.statusCode === 429) return new RateLimitError(detail, err)
    return new TransportError(`API call failed (status ${err.statusCode ?? "n/a"}): ${detail}`, err)
  }
  return new TransportError(err instanceof Error ? err.message : String(err), err)
}

/**
 * Creates a client handle for OpenRouter. The handle owns an abort controller:
 * `release()` cancels in-flight calls and refuses new ones.
 */
export function createOpenRouterVisionClient(config: OpenRouterClientConfig): VisionClientHandle {
  if (!config.apiKey || typeof config.apiKey !== "string") {
    throw new Error("OpenRouter API key must be a non-empty string")
  }
  const openrouter = createOpenRouter({ apiKey: config.apiKey, baseURL: config.baseURL })
  const controller = new AbortController()

  return {
    get released() {
      return controller.signal.aborted
    },
    release() {
      controller.abort()
    },
    async complete(request) {
      if (controller.signal.aborted) {
        throw new TransportError("Vision client has been released")
      }
      try {
        const result = await generateText({
          model: openrouter.chat(request.model),
          messages: buildMessages(request),
          // Retries are owned by withRetries; the SDK must surface 429s directly.
          maxRetries: 0,
          abortSignal: controller.signal,
          // Passed through verbatim so the exact token-limit field name reaches the API.
          providerOptions: {
            openrouter: { [request.tokenLimit.param]: request.tokenLimit.value },
          },
        })
        return result.text ?? ""
      } catch (err) {
        throw toTransportFailure(err)
      }
    },
  }
}

/**
 * Acquires one client handle for the duration of `fn` and always releases it.
 */
export async function withVisionClient<T>(
  open: () => VisionClientHandle,
  fn: (client: VisionClientHandle) => Promise<T>,
): Promise<T> {
  const client = open()
  try {
    return await fn(client)
  } finally {
    client.release()
  }
}
