import * as path from "node:path"
import { resolveEncoding } from "../core/encoding"
import { NotFoundError } from "../core/errors"
import type { FilePath, TextEncoding, TextFileStore } from "../ports/text-file-store"

/**
 * In-process store keyed by absolute path. Content is kept as bytes, so reading
 * with a different encoding than the one written behaves like a real file.
 */
export class MemoryTextStore implements TextFileStore {
  private readonly files = new Map<string, Buffer>()

  async read(filePath: FilePath, encoding?: TextEncoding): Promise<string> {
    const target = path.resolve(filePath)
    const bufferEncoding = resolveEncoding(target, encoding)

    const data = this.files.get(target)
    if (!data) throw NotFoundError.forPath(target)

    return data.toString(bufferEncoding)
  }

  async write(filePath: FilePath, text: string, encoding?: TextEncoding): Promise<void> {
    const target = path.resolve(filePath)
    const bufferEncoding = resolveEncoding(target, encoding)

    this.files.set(target, Buffer.from(text, bufferEncoding))
  }

  async exists(filePath: FilePath): Promise<boolean> {
    return this.files.has(path.resolve(filePath))
  }

  /** Absolute paths currently stored, in write order. */
  paths(): string[] {
    return [...this.files.keys()]
  }

  clear(): void {
    this.files.clear()
  }
}

export function createMemoryTextStore(): TextFileStore {
  return new MemoryTextStore()
}
