import type { Logger } from "./logger.js";

export interface Closeable {
  close(): void;
}

/**
 * Signal handler that closes the store and exits: 0 when the final write
 * succeeds, 1 when it throws.
 */
export function createShutdown(
  store: Closeable,
  logger: Logger,
  exit: (code: number) => void = (code) => process.exit(code),
): (signal: string) => void {
  return (signal) => {
    logger.info("shutting down", { signal });
    try {
      store.close();
    } catch (error) {
      logger.error("failed to close memory store", {
        error: error instanceof Error ? error.message : String(error),
      });
      exit(1);
      return;
    }
    exit(0);
  };
}
