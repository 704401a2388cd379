import { UnknownModelError } from "../lib/errors"

export type TokenLimitParam = "max_tokens" | "max_completion_tokens"

export type ModelFamily = "legacy" | "next-gen"

export type ModelCapabilities = {
  id: string
  family: ModelFamily
  /** Request field that caps output length; sending the other one is rejected by the API. */
  tokenLimitParam: TokenLimitParam
  defaultMaxTokens: number
}

const FAMILY_DEFAULTS: Record<ModelFamily, Pick<ModelCapabilities, "tokenLimitParam" | "defaultMaxTokens">> = {
  "next-gen": { tokenLimitParam: "max_completion_tokens", defaultMaxTokens: 20 },
  legacy: { tokenLimitParam: "max_tokens", defaultMaxTokens: 5 },
}

/**
 * Vision models known to the bench, as OpenRouter model IDs.
 * Add an entry here to support a new model; capabilities are never inferred from the ID.
 */
const MODEL_CONFIG = [
  {
    id: "openai/gpt-5.1",
    family: "next-gen",
  },
  {
    id: "openai/gpt-5",
    family: "next-gen",
  },
  {
    id: "openai/gpt-4.1",
    family: "legacy",
  },
  {
    id: "openai/gpt-4o",
    family: "legacy",
  },
] as const satisfies ReadonlyArray<Pick<ModelCapabilities, "id" | "family">>

export const DEFAULT_MODEL = "openai/gpt-4o"

export const KNOWN_MODELS: readonly string[] = MODEL_CONFIG.map((entry) => entry.id)

export const MODEL_CAPABILITIES = MODEL_CONFIG.reduce<Record<string, ModelCapabilities>>((acc, entry) => {
  acc[entry.id] = { ...entry, ...FAMILY_DEFAULTS[entry.family] }
  return acc
}, {})

export type CapabilityOverrides = {
  tokenLimitParam?: TokenLimitParam
  maxTokens?: number
}

/**
 * Resolves the capability descriptor of a model.
 * Overrides win over the catalog; a model outside the catalog needs `tokenLimitParam`.
 * @param modelId - OpenRouter model ID.
 * @param overrides - Values supplied on the command line.
 * @throws UnknownModelError if the model is unknown and no token parameter was given.
 */
export function getModelCapabilities(modelId: string, overrides: CapabilityOverrides = {}): ModelCapabilities {
  const known = MODEL_CAPABILITIES[modelId]
  if (known) {
    return {
      ...known,
      tokenLimitParam: overrides.tokenLimitParam ?? known.tokenLimitParam,
      defaultMaxTokens: overrides.maxTokens ?? known.defaultMaxTokens,
    }
  }
  if (!overrides.tokenLimitParam) {
    throw new UnknownModelError(modelId, KNOWN_MODELS)
  }
  const family: ModelFamily = overrides.tokenLimitParam === "max_completion_tokens" ? "next-gen" : "legacy"
  return {
    id: modelId,
    family,
    tokenLimitParam: overrides.tokenLimitParam,
    defaultMaxTokens: overrides.maxTokens ?? FAMILY_DEFAULTS[family].defaultMaxTokens,
  }
}

export function isTokenLimitParam(x: unknown): x is TokenLimitParam {
  return x === "max_tokens" || x === "max_completion_tokens"
}
