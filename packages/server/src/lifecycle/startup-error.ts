import { BaseError } from "@nimbus/errors"
import type { StartFailed } from "./startup"

export class StartupError extends BaseError<"startup_failed"> {
  static fromResult(result: StartFailed): StartupError {
    const failed = result.failures.map((f) => f.hook)
    const reason = result.timedOut ? "timed out" : "failed"

    return new StartupError(
      failed.length > 0
        ? `Startup ${reason} in hook(s): ${failed.join(", ")}`
        : `Startup ${reason}`,
      {
        code: "startup_failed",
        context: { failedHooks: failed, timedOut: result.timedOut },
        cause: result.failures[0]?.error,
        isOperational: false,
      },
    )
  }
}
