import type { Logger } from '../lib/logger.js';
import type { RemoteExecutor } from '../runner/executor-interface.js';
import type { AttemptRecorder } from './attempt-recorder.js';
import type { RandomSource } from './host-order.js';

export interface CommandJob {
  id: number;
  command: string;
}

export interface AttemptRecord {
  commandId: number;
  sequence: number;
  host: string;
  outcome: 'success' | 'failure';
  artifactPath: string;
  detail?: string;
}

export type CommandOutcome = 'succeeded' | 'exhausted' | 'aborted';

export interface CompletionResult {
  commandId: number;
  outcome: CommandOutcome;
  attempts: AttemptRecord[];
  // Set on success: the final artifact, or the attempt artifact when promotion failed
  outputPath?: string;
  promoted?: boolean;
}

export interface RunSummary {
  total: number;
  succeeded: number;
  failed: number;
  results: CompletionResult[];
}

export interface DispatchDeps {
  executor: RemoteExecutor;
  recorder: AttemptRecorder;
  logger: Logger;
  random?: RandomSource;
}
