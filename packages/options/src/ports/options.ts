import type { Logger } from "@confbag/logger"
import type { OptionFileCache } from "./option-file-cache"
import type { OptionSerializer } from "./option-serializer"

/**
 * One option file path, or several applied in order.
 *
 * When written to, a list resolves to its last element.
 */
export type OptionFiles = string | readonly string[]

/**
 * Collaborators of an options container. Clones share them.
 */
export type OptionsInit = {
  /**
   * Parsed-file memo.
   *
   * @default the process-wide shared cache
   */
  cache?: OptionFileCache

  /**
   * @default JSON, two-space indent
   */
  serializer?: OptionSerializer

  /**
   * Receives the "Loading options from ..." diagnostic when the `verbose`
   * option is truthy.
   *
   * @default a shared pino logger writing to stderr
   */
  logger?: Logger

  /**
   * Base directory for relative option file paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}
