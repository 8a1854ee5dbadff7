import { z } from "zod"
import type { OptionValue } from "../../ports/option-value"
import type { OptionFiles } from "../../ports/options"

const optionFilesSchema = z.union([z.string(), z.array(z.string())])

/**
 * Reads the `optionfile` setting. Anything other than a path or a list of
 * paths counts as unset.
 */
export function parseOptionFilesSetting(value: OptionValue | undefined): OptionFiles | undefined {
  const result = optionFilesSchema.safeParse(value)

  return result.success ? result.data : undefined
}

/**
 * Paths to read, in order. Empty paths are dropped.
 */
export function filesToRead(files: OptionFiles | undefined): string[] {
  if (files === undefined) return []

  const list = typeof files === "string" ? [files] : [...files]

  return list.filter((file) => file.length > 0)
}

/**
 * The path to write: the value itself, or the last element of a list.
 */
export function fileToWrite(files: OptionFiles | undefined): string | undefined {
  const target = typeof files === "string" ? files : files?.at(-1)

  return target ? target : undefined
}
