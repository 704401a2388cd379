import "dotenv/config"
import { z } from "zod"

const EnvSchema = z.object({
  OPENROUTER_API_KEY: z.string().trim().min(1).optional(),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  LOG_FILE: z.string().trim().min(1).optional(),
})

export type Env = z.infer<typeof EnvSchema>

/**
 * Validates the environment (after `.env` has been loaded).
 * @param source - Defaults to `process.env`.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")
    throw new Error(`Invalid environment: ${issues}`)
  }
  return parsed.data
}

/**
 * Returns the OpenRouter key or explains how to set it.
 */
export function requireApiKey(env: Env): string {
  if (!env.OPENROUTER_API_KEY) {
    throw new Error(
      "Missing OPENROUTER_API_KEY env var. Set it (or add it to .env) and rerun, e.g. OPENROUTER_API_KEY=... npm run run.",
    )
  }
  return env.OPENROUTER_API_KEY
}
