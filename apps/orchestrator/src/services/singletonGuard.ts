import lockfile from "proper-lockfile";

import { AlreadyRunningError } from "../errors.js";

export type ExclusiveToken = {
  lockPath: string;
  release(): void;
};

export type SingletonGuardOptions = {
  /** Called from a timer if the lock directory disappears or cannot be refreshed. */
  onCompromised: (error: Error) => void;
  staleMs?: number;
};

const DEFAULT_STALE_MS = 30_000;

const isLockedError = (error: unknown): boolean => {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ELOCKED";
};

/**
 * Takes the orchestrator lock without waiting. The token must be kept for
 * the lifetime of the process; the lock is dropped automatically on exit.
 */
export const acquireSingleton = (
  target: string,
  lockPath: string,
  options: SingletonGuardOptions
): ExclusiveToken => {
  let unlock: () => void;
  // A compromised lock is already gone; releasing it again would throw.
  let released = false;

  try {
    unlock = lockfile.lockSync(target, {
      realpath: false,
      lockfilePath: lockPath,
      stale: options.staleMs ?? DEFAULT_STALE_MS,
      onCompromised: (error) => {
        released = true;
        options.onCompromised(error);
      }
    });
  } catch (error) {
    if (isLockedError(error)) {
      throw new AlreadyRunningError(`Another orchestrator instance is running (${lockPath})`, {
        cause: error
      });
    }

    throw error;
  }

  return {
    lockPath,
    release: () => {
      if (released) {
        return;
      }

      released = true;
      unlock();
    }
  };
};
