import { type Logger, PinoLogger } from "@confbag/logger"
import { JsonOptionSerializer } from "../adapters/json/json-option-serializer"
import { MemoryOptionFileCache } from "../adapters/memory/memory-option-file-cache"
import type { OptionFileCache } from "../ports/option-file-cache"
import type { OptionSerializer } from "../ports/option-serializer"

/**
 * Process-wide parsed-file cache shared by every container that is not given
 * its own. Call `clear()` to reset it between tests.
 */
export const defaultOptionFileCache: OptionFileCache = new MemoryOptionFileCache()

export const defaultOptionSerializer: OptionSerializer = new JsonOptionSerializer()

let sharedLogger: Logger | undefined

export function defaultOptionsLogger(): Logger {
  sharedLogger ??= new PinoLogger({ level: "info", destination: 2 }, { module: "options" })

  return sharedLogger
}
