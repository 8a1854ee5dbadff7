import { BaseError } from "@confbag/errors"

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}

function errnoCode(cause: unknown): string | undefined {
  if (!(cause instanceof Error) || !("code" in cause)) return undefined

  return typeof cause.code === "string" ? cause.code : undefined
}

/**
 * Text that should hold an option mapping could not be parsed into one.
 */
export class DeserializationError extends BaseError<"deserialization_failed"> {
  readonly source: string

  constructor(source: string, detail: string, cause?: unknown) {
    super(`Unable to process ${source}: ${detail}`, {
      code: "deserialization_failed",
      context: { source, detail },
      cause,
    })

    this.source = source
  }
}

export class SerializationError extends BaseError<"serialization_failed"> {
  constructor(cause: unknown) {
    super(`Unable to serialize options: ${describeCause(cause)}`, {
      code: "serialization_failed",
      cause,
    })
  }
}

export type IoErrorCode =
  | "file_read_failed"
  | "file_open_failed"
  | "file_write_failed"
  | "file_close_failed"

/**
 * A file system call on an option file failed. `cause` holds the system error.
 */
export class IoError<C extends IoErrorCode = IoErrorCode> extends BaseError<C> {
  readonly path: string

  constructor(code: C, action: string, path: string, cause: unknown) {
    super(`Unable to ${action} option file ${path}: ${describeCause(cause)}`, {
      code,
      context: { path, errno: errnoCode(cause) },
      cause,
    })

    this.path = path
  }
}

export class FileReadError extends IoError<"file_read_failed"> {
  constructor(path: string, cause: unknown) {
    super("file_read_failed", "read", path, cause)
  }
}

export class FileOpenError extends IoError<"file_open_failed"> {
  constructor(path: string, cause: unknown) {
    super("file_open_failed", "open for writing", path, cause)
  }
}

export class FileWriteError extends IoError<"file_write_failed"> {
  constructor(path: string, cause: unknown) {
    super("file_write_failed", "write", path, cause)
  }
}

export class FileCloseError extends IoError<"file_close_failed"> {
  constructor(path: string, cause: unknown) {
    super("file_close_failed", "close", path, cause)
  }
}

export class OptionFileTargetError extends BaseError<"option_file_target_missing"> {
  constructor() {
    super("No option file to write: pass a path or set the 'optionfile' option", {
      code: "option_file_target_missing",
    })
  }
}

export function isMissingFileError(err: unknown): boolean {
  const code = errnoCode(err)

  return code === "ENOENT" || code === "ENOTDIR"
}
