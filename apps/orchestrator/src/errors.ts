import { EXIT_CODES } from "@relaycam/shared";

/**
 * Errors that end the process. Only the CLI entry point turns them into an
 * exit status.
 */
export abstract class FatalError extends Error {
  abstract readonly exitCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends FatalError {
  readonly exitCode = EXIT_CODES.configuration;
}

export class CredentialError extends FatalError {
  readonly exitCode = EXIT_CODES.credentials;
}

export class AlreadyRunningError extends FatalError {
  readonly exitCode = EXIT_CODES.alreadyRunning;
}

export class LockCompromisedError extends FatalError {
  readonly exitCode = EXIT_CODES.alreadyRunning;
}

export class LiveRecoveryExhaustedError extends FatalError {
  readonly exitCode = EXIT_CODES.recoveryExhausted;
}

export class ShutdownRequestedError extends Error {
  constructor(readonly signal: NodeJS.Signals) {
    super(`Shutdown requested (${signal})`);
    this.name = "ShutdownRequestedError";
  }
}

export class RemoteCallError extends Error {
  constructor(
    message: string,
    readonly reasons: string[] = [],
    readonly status: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "RemoteCallError";
  }
}

export const errorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error ?? "Unknown error");
};
