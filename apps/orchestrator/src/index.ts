#!/usr/bin/env node
import "dotenv/config";

import { EXIT_CODES, type OrchestratorConfig } from "@relaycam/shared";

import { exitCodeFor, runDaemon } from "./daemon.js";
import { createLogger } from "./logger.js";
import { createAppContext, createOauthService } from "./services/appContext.js";
import { loadConfig } from "./services/configService.js";
import { resolveRuntimePaths } from "./services/runtimeContext.js";
import { acquireSingleton } from "./services/singletonGuard.js";

const USAGE = "Usage: relaycam [run|authorize]";

const main = async (args: string[]): Promise<number> => {
  const command = args[0] ?? "run";
  const bootLogger = createLogger("info");

  let config: OrchestratorConfig;
  try {
    config = loadConfig();
  } catch (error) {
    return exitCodeFor(bootLogger, error);
  }

  const logger = createLogger(config.logLevel);

  switch (command) {
    case "run":
      try {
        const paths = resolveRuntimePaths(config);
        return await runDaemon({
          logger,
          acquireLock: (onCompromised) => acquireSingleton(paths.lockTarget, paths.lockPath, { onCompromised }),
          createDriver: () => createAppContext(config, logger).driver
        });
      } catch (error) {
        return exitCodeFor(logger, error);
      }
    case "authorize":
      try {
        await createOauthService(config, logger).authorize();
        return EXIT_CODES.shutdown;
      } catch (error) {
        return exitCodeFor(logger, error);
      }
    default:
      logger.error({ command }, USAGE);
      return EXIT_CODES.configuration;
  }
};

void main(process.argv.slice(2)).then((code) => {
  process.exit(code);
});
