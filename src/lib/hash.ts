import { createHash } from "node:crypto"

/**
 * Computes the SHA-256 hash of one or more parts and returns it as a hexadecimal string.
 * Strings are hashed as UTF-8.
 * @param parts - Strings or bytes, hashed in order.
 * @returns Hexadecimal representation of the SHA-256 hash.
 */
export async function sha256Hex(...parts: Array<string | Uint8Array>): Promise<string> {
  if (parts.length === 0) {
    throw new Error("At least one input is required")
  }
  const hash = createHash("sha256")
  for (const part of parts) {
    if (typeof part !== "string" && !(part instanceof Uint8Array)) {
      throw new Error("Input must be a string or Uint8Array")
    }
    hash.update(part)
  }
  return hash.digest("hex")
}
