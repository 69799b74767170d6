/**
 * Graceful shutdown management for CLI commands.
 * Stops segment scheduling on the first signal and removes temporary
 * segment directories before exiting.
 */
import chalk from "chalk";

/**
 * Shutdown manager instance returned by createShutdownManager.
 */
export interface ShutdownManager {
  /** Set up SIGINT and SIGTERM handlers. Call once at command start. */
  setup: () => void;
  /** Returns false if shutdown has been requested. Use in loops. */
  shouldContinue: () => boolean;
  /** Register a cleanup callback (e.g. removing a segment workspace). */
  registerCleanup: (fn: () => void | Promise<void>) => void;
  /** Check if shutdown is in progress. */
  isShuttingDown: () => boolean;
}

/**
 * Creates a shutdown manager for graceful CLI termination.
 *
 * @example
 * ```typescript
 * const shutdown = createShutdownManager();
 * shutdown.setup();
 * shutdown.registerCleanup(() => workspace.dispose());
 *
 * await fetchSegments(playlist, { workspace, shouldContinue: shutdown.shouldContinue });
 * ```
 */
export function createShutdownManager(): ShutdownManager {
  let shuttingDown = false;
  let onCleanup: (() => Promise<void>) | undefined;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      // Force exit on second signal
      console.log(chalk.red("\n\n⚠️  Force exit"));
      process.exit(1);
    }

    shuttingDown = true;
    console.log(chalk.yellow(`\n\n⏹️  ${signal} received, shutting down gracefully...`));

    try {
      if (onCleanup) {
        await onCleanup();
      }
      console.log(chalk.gray("   Cleanup complete. Temporary segments removed."));
    } catch (error) {
      console.log(chalk.gray(`   Cleanup failed: ${String(error)}`));
    }

    process.exit(130);
  };

  return {
    setup: () => {
      process.on("SIGINT", () => void shutdown("SIGINT"));
      process.on("SIGTERM", () => void shutdown("SIGTERM"));
    },

    shouldContinue: () => !shuttingDown,

    isShuttingDown: () => shuttingDown,

    registerCleanup: (fn: () => void | Promise<void>) => {
      const previousCleanup = onCleanup;
      onCleanup = async () => {
        if (previousCleanup) {
          await previousCleanup();
        }
        await fn();
      };
    },
  };
}
