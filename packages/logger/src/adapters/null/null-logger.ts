import type { LogContext, LogContextPatch } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"

const discard = (): void => {}

/**
 * Logger that drops every entry. Children drop theirs as well.
 */
export function createNullLogger<TContext extends LogContext = LogContext>(): Logger<TContext> {
  return {
    trace: discard,
    debug: discard,
    info: discard,
    warn: discard,
    error: discard,
    fatal: discard,
    child: <U extends LogContextPatch>() => createNullLogger<TContext & U>(),
  }
}
