import fs from "node:fs"
import path from "node:path"
import type { Logger } from "@confbag/logger"
import { FileReadError, isMissingFileError } from "../../errors/options-errors"
import type { OptionFileCache } from "../../ports/option-file-cache"
import type { OptionSerializer } from "../../ports/option-serializer"
import type { OptionValue } from "../../ports/option-value"
import type { OptionFiles } from "../../ports/options"
import type { MergeInput } from "../options"
import { copyMap, deepFreeze } from "../value/describe-value"
import { filesToRead } from "./option-files"

export type LoadTarget = {
  get(key: string): OptionValue | undefined
  deepMerge(input: MergeInput): unknown
}

export type LoadOptionFilesDeps = {
  cache: OptionFileCache
  serializer: OptionSerializer
  logger: Logger
  cwd: string
}

/**
 * Deep-merges each option file into `target`, in order.
 *
 * Paths are resolved against `cwd` and memoized in `cache`: a cached path is
 * merged from memory without touching the disk. Missing files are skipped.
 * Read and parse failures propagate and stop the load; files merged before
 * the failure stay merged.
 *
 * @returns how many files were read from disk; cache hits are not counted.
 */
export function loadOptionFiles(
  target: LoadTarget,
  files: OptionFiles | undefined,
  deps: LoadOptionFilesDeps,
): number {
  let loaded = 0

  for (const file of filesToRead(files)) {
    const filePath = path.resolve(deps.cwd, file)
    const cached = deps.cache.get(filePath)

    if (cached !== undefined) {
      target.deepMerge(copyMap(cached))
      continue
    }

    const content = readOptionFile(filePath)
    if (content === undefined) continue

    if (target.get("verbose")) {
      deps.logger.info(`Loading options from ${filePath}`, {
        file: filePath,
        operation: "load",
      })
    }

    const parsed = deepFreeze(deps.serializer.parse(content, `options file ${filePath}`))

    target.deepMerge(copyMap(parsed))
    deps.cache.set(filePath, parsed)
    loaded++
  }

  return loaded
}

function readOptionFile(filePath: string): string | undefined {
  try {
    return fs.readFileSync(filePath, "utf-8")
  } catch (err) {
    if (isMissingFileError(err)) return undefined

    throw new FileReadError(filePath, err)
  }
}
