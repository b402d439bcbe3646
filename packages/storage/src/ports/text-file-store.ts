/**
 * Name of a Node buffer encoding ("utf8", "utf16le", "latin1", ...).
 * Unknown names are rejected at run time, before any I/O.
 */
export type TextEncoding = string

export type FilePath = string

/**
 * Whole-file text persistence.
 *
 * `write` is atomic with respect to crashes: a reader sees either the previous
 * complete content or the new complete content, never a mix.
 */
export interface TextFileStore {
  /**
   * @throws NotFoundError when nothing exists at `path`.
   * @throws IOError for any other fault.
   */
  read(path: FilePath, encoding?: TextEncoding): Promise<string>

  /**
   * Replace the content at `path`, creating parent directories as needed.
   *
   * @throws IOError, with the underlying fault as `cause`.
   */
  write(path: FilePath, text: string, encoding?: TextEncoding): Promise<void>

  /** `true` when an entry exists at `path`. */
  exists(path: FilePath): Promise<boolean>
}
