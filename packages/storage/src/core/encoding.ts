import type { TextEncoding } from "../ports/text-file-store"
import { IOError } from "./errors"

export const DEFAULT_ENCODING = "utf8" satisfies BufferEncoding

export function resolveEncoding(path: string, encoding: TextEncoding | undefined): BufferEncoding {
  const name = encoding ?? DEFAULT_ENCODING

  if (!Buffer.isEncoding(name)) {
    throw IOError.unsupportedEncoding(path, name)
  }

  return name
}
