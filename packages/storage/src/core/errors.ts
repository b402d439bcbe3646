import { BaseError, findInChain } from "@keel/errors"

export type NotFoundErrorCode = "not_found"
export type IOErrorCode = "io_error"

export class NotFoundError extends BaseError<NotFoundErrorCode> {
  static forPath(path: string, cause?: unknown): NotFoundError {
    return new NotFoundError(`No file at ${path}`, {
      code: "not_found",
      context: { path },
      cause,
    })
  }
}

export class IOError extends BaseError<IOErrorCode> {
  static readFailed(path: string, cause: unknown): IOError {
    return new IOError(`Failed to read ${path}`, {
      code: "io_error",
      context: { path, operation: "read", ...errnoContext(cause) },
      cause,
      isRetryable: true,
    })
  }

  static writeFailed(
    path: string,
    cause: unknown,
    cleanup?: { tempPath: string; error: unknown },
  ): IOError {
    return new IOError(`Failed to write ${path}`, {
      code: "io_error",
      context: {
        path,
        operation: "write",
        ...errnoContext(cause),
        ...(cleanup && {
          orphanedTempPath: cleanup.tempPath,
          cleanupErrno: errnoOf(cleanup.error)?.code,
        }),
      },
      cause,
      isRetryable: true,
    })
  }

  static statFailed(path: string, cause: unknown): IOError {
    return new IOError(`Failed to inspect ${path}`, {
      code: "io_error",
      context: { path, operation: "stat", ...errnoContext(cause) },
      cause,
      isRetryable: true,
    })
  }

  static unsupportedEncoding(path: string, encoding: string): IOError {
    return new IOError(`Unsupported text encoding "${encoding}"`, {
      code: "io_error",
      context: { path, encoding },
      isRetryable: false,
    })
  }
}

export function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && "code" in value && typeof value.code === "string"
}

export function errnoOf(err: unknown): NodeJS.ErrnoException | undefined {
  return findInChain(err, isErrnoException)
}

export function isNotFoundError(err: unknown): boolean {
  const code = errnoOf(err)?.code
  return code === "ENOENT" || code === "ENOTDIR"
}

function errnoContext(err: unknown): { errno?: string } {
  const code = errnoOf(err)?.code
  return code === undefined ? {} : { errno: code }
}
