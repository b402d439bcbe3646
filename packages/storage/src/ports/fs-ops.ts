/**
 * The slice of `node:fs/promises` used by the file system store.
 * Kept narrow so tests can simulate a fault at any step.
 */
export interface FsFileHandle {
  writeFile(data: string, options: { encoding: BufferEncoding }): Promise<void>
  sync(): Promise<void>
  close(): Promise<void>
}

export interface FsStats {
  isFile(): boolean
  isDirectory(): boolean
}

export interface FsOps {
  open(path: string, flags: "wx"): Promise<FsFileHandle>
  readFile(path: string, options: { encoding: BufferEncoding }): Promise<string>
  rename(oldPath: string, newPath: string): Promise<void>
  unlink(path: string): Promise<void>
  mkdir(path: string, options: { recursive: true }): Promise<string | undefined>
  stat(path: string): Promise<FsStats>
}
