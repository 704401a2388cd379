export {
  NORMALIZED_ANSWERS,
  type NormalizedAnswer,
  isNormalizedAnswer,
  normalizeAnswer,
  isFalsePositive,
} from "./src/lib/answers"

export {
  withRetries,
  parseSuggestedWaitMs,
  backoffDelayMs,
  isRateLimitError,
  DEFAULT_MAX_ATTEMPTS,
  type RetryOptions,
} from "./src/lib/retry"

export {
  createDispatcher,
  buildVisionRequest,
  dispatch,
  type Dispatcher,
  type DispatchInput,
} from "./src/lib/dispatch"

export {
  createOpenRouterVisionClient,
  withVisionClient,
  type VisionClient,
  type VisionClientHandle,
  type VisionRequest,
} from "./src/lib/client"

export {
  planRun,
  runPromptVariant,
  runAndPersist,
  runPromptVariants,
  type RunParams,
  type RunProgressEvent,
  type PersistedRun,
} from "./src/lib/run"

export {
  aggregate,
  aggregateAll,
  findDuplicateRecords,
  GROUPINGS,
  type RateRow,
  type GroupKey,
  type Grouping,
} from "./src/lib/aggregate"

export { findTransitions, joinRecords, type TransitionCase, type Transitions } from "./src/lib/cases"

export { loadGroundTruth, parseGroundTruth, parseObjectList } from "./src/lib/groundTruth"

export {
  loadResultCollections,
  writeResultCollection,
  resultFileName,
  type ResultCollection,
} from "./src/lib/results"

export { QueryRecordSchema, ABSENT_FLAG, type QueryRecord, type GroundTruthEntry } from "./src/lib/records"

export {
  BenchError,
  RateLimitError,
  TransportError,
  RetriesExhaustedError,
  MalformedGroundTruthError,
  InvalidResultFileError,
  UnknownModelError,
} from "./src/lib/errors"

export { getModelCapabilities, KNOWN_MODELS, type ModelCapabilities } from "./src/config/models"

export { PROMPT_VARIANTS, renderPrompt, type PromptVariant } from "./src/config/prompts"
