import type { OptionMap } from "../ports/option-value"
import type { OptionFiles, OptionsInit } from "../ports/options"
import { Options } from "./options"

export type LoadOptionsParams = OptionsInit & {
  defaults?: OptionMap

  /**
   * Files deep-merged over the defaults, in order. Falls back to the
   * `optionfile` key of `defaults`.
   */
  files?: OptionFiles

  /** Shallow-merged last */
  overrides?: OptionMap
}

/**
 * Builds a container from defaults, then option files, then overrides.
 */
export function loadOptions({
  defaults,
  files,
  overrides,
  ...init
}: LoadOptionsParams = {}): Options {
  const options = new Options(defaults, init)

  options.loadFiles(files)
  options.merge(overrides)

  return options
}
