import pino from "pino";
import type { Logger } from "pino";

export const baseLogger: Logger = pino({
  name: "modal-command-core",
  level: process.env.MODAL_CORE_LOG_LEVEL ?? "warn",
});

export function getLogger(
  bindings: Record<string, unknown> = {},
  level?: string,
): Logger {
  return level === undefined
    ? baseLogger.child(bindings)
    : baseLogger.child(bindings, { level });
}

export function extractErrorInfo(error: unknown): {
  errorMessage: string;
  errorName?: string;
  errorStack?: string;
  cause?: unknown;
} {
  if (!(error instanceof Error)) {
    return { errorMessage: String(error) };
  }
  return {
    errorMessage: error.message,
    errorName: error.name,
    errorStack: error.stack,
    ...(error.cause === undefined ? {} : { cause: error.cause }),
  };
}

export function logError(
  logger: Logger,
  error: unknown,
  message: string,
  additionalContext: Record<string, unknown> = {},
): void {
  logger.error({ ...extractErrorInfo(error), ...additionalContext }, message);
}
