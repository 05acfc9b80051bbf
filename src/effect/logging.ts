/**
 * Bridge from the synchronous core's logger into Effect's logger.
 */
import { Effect, Logger, Runtime } from "effect"
import type { LogLevel } from "effect"
import type { CoreLogger } from "../core/layout-state"

/**
 * Core logger that logs on `runtime`, so whatever loggers that runtime
 * carries receive core messages, filtered at `minimumLevel`.
 */
export const makeCoreLogger = <R>(
  runtime: Runtime.Runtime<R>,
  minimumLevel: LogLevel.LogLevel
): CoreLogger => {
  const runSync = Runtime.runSync(runtime)

  const emit = (
    log: (message: string) => Effect.Effect<void>,
    message: string,
    fields: Record<string, unknown> = {}
  ) =>
    runSync(
      log(message).pipe(
        Effect.annotateLogs(fields),
        Effect.annotateLogs("module", "core"),
        Logger.withMinimumLogLevel(minimumLevel)
      )
    )

  return {
    debug: (message, fields) => emit(Effect.logDebug, message, fields),
    warn: (message, fields) => emit(Effect.logWarning, message, fields),
  }
}
