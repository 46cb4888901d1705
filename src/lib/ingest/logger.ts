import type { IngestLogger } from './types';

function formatMeta(meta?: Record<string, unknown>) {
  if (!meta) {
    return {};
  }
  return { meta };
}

export const jsonLogger: IngestLogger = {
  info(message, meta) {
    console.log(
      JSON.stringify({
        level: 'info',
        message,
        ...formatMeta(meta),
      }),
    );
  },
  warn(message, meta) {
    console.warn(
      JSON.stringify({
        level: 'warn',
        message,
        ...formatMeta(meta),
      }),
    );
  },
  error(message, meta) {
    console.error(
      JSON.stringify({
        level: 'error',
        message,
        ...formatMeta(meta),
      }),
    );
  },
};

// Components that only report failures by default stay quiet on info.
export const errorOnlyLogger: IngestLogger = {
  info() {},
  warn: jsonLogger.warn,
  error: jsonLogger.error,
};

export function warn(logger: IngestLogger, message: string, meta?: Record<string, unknown>): void {
  if (logger.warn) {
    logger.warn(message, meta);
    return;
  }
  logger.info(message, meta);
}

export function describeError(error: unknown): { error: string; stack?: string } {
  return {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  };
}
