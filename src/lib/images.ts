import { access, readFile } from "node:fs/promises"
import { constants } from "node:fs"
import path from "node:path"

const MIME_BY_EXTENSION: Record<string, string> = {
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".webp": "image/webp",
  ".gif": "image/gif",
}

export type ImageResource = {
  path: string
  mimeType: string
  bytes: Uint8Array
}

export function resolveImagePath(imageRoot: string, foldername: string, filename: string): string {
  return path.join(imageRoot, foldername, filename)
}

/**
 * True when the file exists and is readable.
 */
export async function imageExists(imagePath: string): Promise<boolean> {
  try {
    await access(imagePath, constants.R_OK)
    return true
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code
    if (code === "ENOENT" || code === "EACCES" || code === "ENOTDIR") return false
    throw err
  }
}

/**
 * MIME type from the file extension; unknown extensions are sent as JPEG.
 */
export function mimeTypeFor(imagePath: string): string {
  return MIME_BY_EXTENSION[path.extname(imagePath).toLowerCase()] ?? "image/jpeg"
}

export async function readImage(imagePath: string): Promise<ImageResource> {
  const bytes = await readFile(imagePath)
  return { path: imagePath, mimeType: mimeTypeFor(imagePath), bytes: new Uint8Array(bytes) }
}

export function toDataUri(image: Pick<ImageResource, "mimeType" | "bytes">): string {
  return `data:${image.mimeType};base64,${Buffer.from(image.bytes).toString("base64")}`
}
