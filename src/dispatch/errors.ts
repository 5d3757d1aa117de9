import type { AttemptRecord, RunSummary } from './types.js';

export type DispatchErrorCode =
  | 'ARTIFACT_CREATE_FAILED'
  | 'ARTIFACT_WRITE_FAILED'
  | 'COMMAND_STOPPED'
  | 'FLEET_ABORTED';

export class DispatchError extends Error {
  readonly code: DispatchErrorCode;

  constructor(code: DispatchErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DispatchError';
    this.code = code;
    Object.setPrototypeOf(this, DispatchError.prototype);
  }
}

/**
 * Raised when an attempt artifact cannot be created. Without durable attempt
 * records the run cannot be accounted for, so this stops the whole fleet.
 */
export class ArtifactCreationError extends DispatchError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('ARTIFACT_CREATE_FAILED', `Could not create attempt artifact ${path}: ${reason}`, { cause });
    this.name = 'ArtifactCreationError';
    this.path = path;
    Object.setPrototypeOf(this, ArtifactCreationError.prototype);
  }
}

// Output could not be written to an attempt artifact that was already open
export class ArtifactWriteError extends DispatchError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('ARTIFACT_WRITE_FAILED', `Could not write attempt artifact ${path}: ${reason}`, { cause });
    this.name = 'ArtifactWriteError';
    this.path = path;
    Object.setPrototypeOf(this, ArtifactWriteError.prototype);
  }
}

/**
 * Thrown by the dispatch engine when a storage error stops a command midway.
 * `attempts` holds the records made before it stopped; `reason` is the error
 * that stopped it.
 */
export class CommandStoppedError extends DispatchError {
  readonly commandId: number;
  readonly attempts: AttemptRecord[];
  readonly reason: Error;

  constructor(commandId: number, attempts: AttemptRecord[], reason: Error) {
    super('COMMAND_STOPPED', `Command ${commandId} stopped: ${reason.message}`, { cause: reason });
    this.name = 'CommandStoppedError';
    this.commandId = commandId;
    this.attempts = attempts;
    this.reason = reason;
    Object.setPrototypeOf(this, CommandStoppedError.prototype);
  }
}

export class FleetAbortedError extends DispatchError {
  readonly summary: RunSummary;

  constructor(cause: Error, summary: RunSummary) {
    super('FLEET_ABORTED', `Run aborted after fatal error: ${cause.message}`, { cause });
    this.name = 'FleetAbortedError';
    this.summary = summary;
    Object.setPrototypeOf(this, FleetAbortedError.prototype);
  }
}
