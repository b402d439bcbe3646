export {
  createFileSystemTextStore,
  FileSystemTextStore,
  type FileSystemTextStoreDeps,
} from "./adapters/fs-text-file-store"
export { createMemoryTextStore, MemoryTextStore } from "./adapters/memory-text-file-store"
export { nodeFsOps } from "./adapters/node-fs-ops"
export { DEFAULT_ENCODING } from "./core/encoding"
export {
  errnoOf,
  IOError,
  type IOErrorCode,
  isErrnoException,
  isNotFoundError,
  NotFoundError,
  type NotFoundErrorCode,
} from "./core/errors"
export type { FsFileHandle, FsOps, FsStats } from "./ports/fs-ops"
export type { FilePath, TextEncoding, TextFileStore } from "./ports/text-file-store"
