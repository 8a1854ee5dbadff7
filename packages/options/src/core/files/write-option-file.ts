import fs from "node:fs"
import path from "node:path"
import {
  FileCloseError,
  FileOpenError,
  FileWriteError,
  OptionFileTargetError,
} from "../../errors/options-errors"
import type { OptionFiles } from "../../ports/options"
import { fileToWrite } from "./option-files"

export type WriteSource = {
  serialize(): string
}

/**
 * Serializes `source` and writes it to the target named by `files`,
 * creating or truncating it. A list of files writes to its last element.
 *
 * Serialization happens before the file is opened, so a failure there leaves
 * the target untouched.
 *
 * @returns the absolute path written.
 */
export function writeOptionFile(
  source: WriteSource,
  files: OptionFiles | undefined,
  deps: { cwd: string },
): string {
  const target = fileToWrite(files)
  if (target === undefined) throw new OptionFileTargetError()

  const filePath = path.resolve(deps.cwd, target)
  const text = source.serialize()

  let fd: number

  try {
    fd = fs.openSync(filePath, "w")
  } catch (err) {
    throw new FileOpenError(filePath, err)
  }

  let writeError: unknown

  try {
    fs.writeFileSync(fd, text, "utf-8")
  } catch (err) {
    writeError = err
  }

  try {
    fs.closeSync(fd)
  } catch (err) {
    // both failed: report the write, with both system errors as the cause
    throw writeError === undefined
      ? new FileCloseError(filePath, err)
      : new FileWriteError(filePath, new AggregateError([writeError, err], messageOf(writeError)))
  }

  if (writeError !== undefined) throw new FileWriteError(filePath, writeError)

  return filePath
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
