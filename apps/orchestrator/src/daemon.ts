import { EXIT_CODES } from "@relaycam/shared";

import { FatalError, LockCompromisedError, ShutdownRequestedError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { OrchestratorDriver } from "./services/orchestratorDriver.js";
import type { ExclusiveToken } from "./services/singletonGuard.js";

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ["SIGTERM", "SIGINT"];

export type DaemonDeps = {
  logger: Logger;
  acquireLock: (onCompromised: (error: Error) => void) => ExclusiveToken;
  createDriver: () => Pick<OrchestratorDriver, "run">;
};

export const exitCodeFor = (logger: Logger, error: unknown): number => {
  if (error instanceof FatalError) {
    logger.fatal({ kind: error.name }, error.message);
    return error.exitCode;
  }

  logger.fatal({ err: error }, `Unexpected failure: ${errorMessage(error)}`);
  return EXIT_CODES.unexpected;
};

/**
 * Holds the singleton lock while the driver runs. Signals and a compromised
 * lock both abort the driver, so the transcoder is stopped before exit.
 */
export const runDaemon = async (deps: DaemonDeps): Promise<number> => {
  const { logger } = deps;
  const controller = new AbortController();

  const lock = deps.acquireLock((error) => {
    logger.fatal({ reason: error.message }, "Orchestrator lock was compromised; stopping");
    controller.abort(
      new LockCompromisedError(`Orchestrator lock was compromised: ${error.message}`, { cause: error })
    );
  });
  logger.info({ lockPath: lock.lockPath, pid: process.pid }, "Orchestrator lock acquired");

  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, "Shutdown requested");
    controller.abort(new ShutdownRequestedError(signal));
  };
  for (const signal of SHUTDOWN_SIGNALS) {
    process.once(signal, onSignal);
  }

  try {
    return await deps.createDriver().run(controller.signal);
  } catch (error) {
    const cause: unknown = controller.signal.aborted ? controller.signal.reason : error;
    if (cause instanceof ShutdownRequestedError) {
      logger.info("Transcoder stopped; exiting");
      return EXIT_CODES.shutdown;
    }

    return exitCodeFor(logger, cause);
  } finally {
    for (const signal of SHUTDOWN_SIGNALS) {
      process.removeListener(signal, onSignal);
    }
    lock.release();
  }
};
