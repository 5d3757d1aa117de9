import type { Writable } from 'stream';

export type ExecutionOutcome =
  | { status: 'success' }
  | { status: 'failure'; detail: string; exitCode: number | null };

export interface RemoteExecutor {
  readonly transport: string;

  // Runs one command on one host, streaming combined stdout/stderr into sink.
  // Failures resolve with detail; retrying is the caller's business.
  execute(command: string, host: string, sink: Writable): Promise<ExecutionOutcome>;

  close(): Promise<void>;
}

export interface SshTransportConfig {
  type: 'ssh';
  binary: string;
  user?: string;
  port?: number;
  keyPath?: string;
  connectTimeoutSeconds: number;
  commandTimeoutSeconds?: number;
  options: string[];
}

export interface SsmTransportConfig {
  type: 'ssm';
  region: string;
  deliveryTimeoutSeconds: number;
  executionTimeoutSeconds: number;
  pollIntervalMs: number;
}

export type TransportConfig = SshTransportConfig | SsmTransportConfig;

export interface DispatchConfig {
  transport: TransportConfig;
  output: {
    dir: string;
  };
  concurrency?: number;
}

export function failure(detail: string, exitCode: number | null = null): ExecutionOutcome {
  return { status: 'failure', detail, exitCode };
}
