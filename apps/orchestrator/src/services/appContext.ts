import type { OrchestratorConfig } from "@relaycam/shared";
import { redactCommand } from "@relaycam/shared";
import type { Logger } from "pino";

import { BroadcastReconciler } from "./broadcastReconciler.js";
import { systemClock, type Clock } from "./clock.js";
import { buildIngestUrl, buildTranscoderArgs } from "./ffmpegService.js";
import { HealthMonitor } from "./healthMonitor.js";
import { OauthService } from "./oauthService.js";
import { OrchestratorDriver } from "./orchestratorDriver.js";
import { FileLogSink, ProcessSupervisor, discardLogSink, type TranscoderLaunch } from "./processSupervisor.js";
import { TokenFileStore, readStreamKey } from "./secretStore.js";
import { YoutubeService } from "./youtubeService.js";

export type AppContext = {
  oauthService: OauthService;
  youtubeService: YoutubeService;
  supervisor: ProcessSupervisor;
  driver: OrchestratorDriver;
};

export const createOauthService = (config: OrchestratorConfig, logger: Logger): OauthService => {
  return new OauthService(
    config.clientSecretsPath,
    new TokenFileStore(config.tokenPath),
    logger.child({ component: "oauth" })
  );
};

export const createAppContext = (
  config: OrchestratorConfig,
  logger: Logger,
  clock: Clock = systemClock
): AppContext => {
  const streamKey = readStreamKey(config.streamKeyPath);
  const oauthService = createOauthService(config, logger);

  // Fail on missing or unreadable credentials before anything starts.
  oauthService.buildOAuthClient();

  const youtubeService = new YoutubeService(oauthService, {
    privacyStatus: config.broadcast.privacyStatus,
    logger: logger.child({ component: "youtube" })
  });
  const supervisor = new ProcessSupervisor({ logger: logger.child({ component: "supervisor" }) });

  const launch: TranscoderLaunch = {
    argv: buildTranscoderArgs(config.transcoder, buildIngestUrl(config.ingestBaseUrl, streamKey)),
    sink: config.logDir ? new FileLogSink(config.logDir, "ffmpeg", clock) : discardLogSink
  };
  logger.info({ command: redactCommand(launch.argv) }, "Transcoder command");

  const shared = { config, broadcasts: youtubeService, supervisor, clock };
  const driver = new OrchestratorDriver({
    ...shared,
    reconciler: new BroadcastReconciler({ ...shared, logger: logger.child({ component: "reconciler" }) }),
    healthMonitor: new HealthMonitor({ ...shared, logger: logger.child({ component: "health" }) }),
    logger: logger.child({ component: "driver" }),
    streamKey,
    launch
  });

  return { oauthService, youtubeService, supervisor, driver };
};
