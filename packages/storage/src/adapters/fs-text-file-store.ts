import * as path from "node:path"
import { nanoid } from "nanoid"
import { resolveEncoding } from "../core/encoding"
import { IOError, isNotFoundError, NotFoundError } from "../core/errors"
import type { FsOps } from "../ports/fs-ops"
import type { FilePath, TextEncoding, TextFileStore } from "../ports/text-file-store"
import { nodeFsOps } from "./node-fs-ops"

export interface FileSystemTextStoreDeps {
  fs?: FsOps
  /** Suffix generator for temporary file names. */
  generateId?: () => string
}

export class FileSystemTextStore implements TextFileStore {
  private readonly fs: FsOps
  private readonly generateId: () => string

  constructor(deps: FileSystemTextStoreDeps = {}) {
    this.fs = deps.fs ?? nodeFsOps
    this.generateId = deps.generateId ?? (() => nanoid())
  }

  async read(filePath: FilePath, encoding?: TextEncoding): Promise<string> {
    const target = path.resolve(filePath)
    const bufferEncoding = resolveEncoding(target, encoding)

    try {
      return await this.fs.readFile(target, { encoding: bufferEncoding })
    } catch (err) {
      if (isNotFoundError(err)) throw NotFoundError.forPath(target, err)
      throw IOError.readFailed(target, err)
    }
  }

  async write(filePath: FilePath, text: string, encoding?: TextEncoding): Promise<void> {
    const target = path.resolve(filePath)
    const bufferEncoding = resolveEncoding(target, encoding)
    const tempPath = this.tempPathFor(target)

    try {
      await this.fs.mkdir(path.dirname(target), { recursive: true })

      const handle = await this.fs.open(tempPath, "wx")
      try {
        await handle.writeFile(text, { encoding: bufferEncoding })
        await handle.sync()
      } finally {
        await handle.close()
      }

      await this.fs.rename(tempPath, target)
    } catch (err) {
      const cleanupError = await this.discard(tempPath)

      throw IOError.writeFailed(
        target,
        err,
        cleanupError === undefined ? undefined : { tempPath, error: cleanupError },
      )
    }
  }

  async exists(filePath: FilePath): Promise<boolean> {
    const target = path.resolve(filePath)

    try {
      await this.fs.stat(target)
      return true
    } catch (err) {
      if (isNotFoundError(err)) return false
      throw IOError.statFailed(target, err)
    }
  }

  /** Temporary sibling of `target`, on the same file system so rename is atomic. */
  tempPathFor(target: string): string {
    return path.join(path.dirname(target), `.${path.basename(target)}.${this.generateId()}.tmp`)
  }

  /**
   * Remove a temporary file left by a failed write.
   * Returns the unlink error when the file could not be removed.
   */
  private async discard(tempPath: string): Promise<unknown> {
    try {
      await this.fs.unlink(tempPath)
      return undefined
    } catch (err) {
      if (isNotFoundError(err)) return undefined
      return err
    }
  }
}

export function createFileSystemTextStore(deps?: FileSystemTextStoreDeps): TextFileStore {
  return new FileSystemTextStore(deps)
}
