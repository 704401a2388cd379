import { getModelCapabilities, type ModelCapabilities } from "../config/models"
import { renderPrompt, type PromptVariant } from "../config/prompts"
import type { VisionClient, VisionRequest } from "./client"
import { toDataUri, type ImageResource } from "./images"
import { DEFAULT_MAX_ATTEMPTS, withRetries, type RetryOptions } from "./retry"

export type DispatchInput = {
  image: Pick<ImageResource, "mimeType" | "bytes">
  objectName: string
  variant: PromptVariant
  model: ModelCapabilities
}

export type DispatcherConfig = {
  client: VisionClient
  maxAttempts?: number
  sleep?: RetryOptions["sleep"]
}

export interface Dispatcher {
  dispatch(input: DispatchInput): Promise<string>
}

/**
 * Builds the request for one (image, object, prompt variant) tuple. The token limit is sent
 * under the parameter name the model's capability descriptor declares.
 * @param input - The tuple to query.
 * @returns Request ready for a VisionClient.
 */
export function buildVisionRequest(input: DispatchInput): VisionRequest {
  return {
    model: input.model.id,
    prompt: renderPrompt(input.variant, input.objectName),
    imageDataUri: toDataUri(input.image),
    tokenLimit: {
      param: input.model.tokenLimitParam,
      value: input.model.defaultMaxTokens,
    },
  }
}

/**
 * Creates a dispatcher bound to one client handle. Dispatching carries no mutable state,
 * so distinct tuples may be dispatched concurrently.
 * @param config - Client handle and retry settings.
 */
export function createDispatcher(config: DispatcherConfig): Dispatcher {
  const maxAttempts = config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS

  return {
    async dispatch(input) {
      const request = buildVisionRequest(input)
      const text = await withRetries(() => config.client.complete(request), {
        maxAttempts,
        sleep: config.sleep,
        context: { model: input.model.id, prompt: input.variant, object: input.objectName },
      })
      return text.trim()
    },
  }
}

/**
 * Convenience for a one-off query by model ID.
 */
export async function dispatch(
  client: VisionClient,
  image: DispatchInput["image"],
  objectName: string,
  variant: PromptVariant,
  modelId: string,
): Promise<string> {
  return createDispatcher({ client }).dispatch({
    image,
    objectName,
    variant,
    model: getModelCapabilities(modelId),
  })
}
