/**
 * Prompt catalog. Every variant asks the same yes/no question about one object; they differ
 * only in framing: neutral (baseline), suggesting the object is there (misleading), or
 * pushing toward visual evidence only (mitigate).
 */
export const PROMPT_VARIANTS = [
  "baseline",
  "misleading1",
  "misleading2",
  "misleading3",
  "misleading4",
  "mitigate1",
  "mitigate2",
  "mitigate3",
  "mitigate4",
] as const

export type PromptVariant = (typeof PROMPT_VARIANTS)[number]

const PROMPT_TEMPLATES: Record<PromptVariant, (obj: string) => string> = {
  baseline: (obj: string) => `
You are an image recognition system. I will give you an image and ask whether a specific object is present.
You must answer strictly with only one word: "yes" or "no". No explanation.

Object to check: "${obj}"

Does this image contain this object?
`,

  misleading1: (obj: string) => `
You are analyzing this image as part of a visual survey.
In similar images from this dataset, the object "${obj}" often appears,
even if partially hidden or small.

Answer strictly with "yes" or "no":
Is the object "${obj}" present in this image?
`,

  misleading2: (obj: string) => `
I thought I saw a "${obj}" somewhere in this image, possibly in the background.
Please confirm my observation.

Answer only with "yes" or "no":
Is the object "${obj}" actually present in this image?
`,

  misleading3: (obj: string) => `
According to visual statistics, images like this often contain a "${obj}",
even if not the main focus.

Answer strictly with "yes" or "no":
Is a "${obj}" present in this image?
`,

  misleading4: (obj: string) => `
This image appears to show a scene where objects commonly related to "${obj}" may appear.

Based on this context, answer only "yes" or "no":
Is a "${obj}" present in the image?
`,

  mitigate1: (obj: string) => `
You must only answer "yes" if the object is clearly and unambiguously visible in the image.
If the object cannot be visually confirmed, or is uncertain, answer "no".

Object: "${obj}"

Based strictly on visible evidence only, does the image contain this object?
Answer only "yes" or "no".
`,

  mitigate2: (obj: string) => `
Do not guess.
If you are not completely certain the object is present, answer "no".
Never infer or assume anything beyond what is visually obvious.

Object: "${obj}"

Answer strictly "yes" or "no":
Is this object visible in the image?
`,

  mitigate3: (obj: string) => `
You are a highly cautious visual verification system designed to avoid hallucination.
You never report an object unless it is clearly identifiable in the pixels.

Object to check: "${obj}"

Answer with "yes" or "no":
Is this object clearly visible?
`,

  mitigate4: (obj: string) => `
Follow this strict rule:

1. Internally analyze the image and form a detailed understanding of the scene.
2. Internally check if the object "${obj}" is visually obvious.
3. If obvious → final answer "yes".
4. If not obvious → final answer "no".

Do all analysis internally.
For the final output, answer only with a single word: "yes" or "no".
`,
}

export const DEFAULT_PROMPT_VARIANTS: PromptVariant[] = ["baseline", "misleading1", "mitigate1"]

export function isPromptVariant(x: unknown): x is PromptVariant {
  return PROMPT_VARIANTS.some((v) => v === x)
}

/**
 * Renders the prompt text of a variant for one object.
 */
export function renderPrompt(variant: PromptVariant, objectName: string): string {
  if (!objectName.trim()) {
    throw new Error("Object name must be a non-empty string")
  }
  return PROMPT_TEMPLATES[variant](objectName)
}
