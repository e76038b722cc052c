import fs from "node:fs";
import path from "node:path";

import type { OrchestratorConfig } from "@relaycam/shared";

export type RuntimePaths = {
  lockTarget: string;
  lockPath: string;
};

const ensureDir = (dirPath: string): void => {
  fs.mkdirSync(dirPath, { recursive: true });
};

export const resolveRuntimePaths = (config: OrchestratorConfig): RuntimePaths => {
  const runDir = path.join(config.baseDir, "run");

  ensureDir(runDir);
  if (config.logDir) {
    ensureDir(config.logDir);
  }

  return {
    lockTarget: path.join(runDir, "orchestrator"),
    lockPath: path.join(runDir, "orchestrator.lock")
  };
};
