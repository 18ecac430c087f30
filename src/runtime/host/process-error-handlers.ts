import { logger } from "../../logger";
import { describeError } from "../gateway/errors";
import { isRecoverableNetworkError } from "../gateway/error-policy";

declare global {
  // eslint-disable-next-line no-var
  var __swarmcastProcessErrorHandlersRegistered: boolean | undefined;
}

export function registerProcessErrorHandlers(): void {
  if (globalThis.__swarmcastProcessErrorHandlersRegistered) {
    return;
  }
  globalThis.__swarmcastProcessErrorHandlersRegistered = true;

  process.on("unhandledRejection", (reason) => {
    if (isRecoverableNetworkError(reason)) {
      logger.warn(
        { error: describeError(reason), recoverable: true },
        "Suppressed recoverable unhandled rejection",
      );
      return;
    }
    logger.error({ error: describeError(reason) }, "Unhandled rejection");
  });

  process.on("uncaughtException", (error) => {
    if (isRecoverableNetworkError(error)) {
      logger.warn(
        { error: describeError(error), recoverable: true },
        "Suppressed recoverable uncaught exception",
      );
      return;
    }

    logger.fatal({ error: describeError(error) }, "Uncaught exception");
    process.exitCode = 1;
  });
}
