import { spawn } from 'child_process';
import type { Writable } from 'stream';
import { failure, type ExecutionOutcome, type RemoteExecutor, type SshTransportConfig } from './executor-interface.js';

export class SSHExecutor implements RemoteExecutor {
  readonly transport = 'ssh';

  constructor(private config: SshTransportConfig) {}

  buildArgs(host: string, command: string): string[] {
    const { user, port, keyPath, connectTimeoutSeconds, options } = this.config;

    const sshArgs = [
      '-o', `ConnectTimeout=${connectTimeoutSeconds}`,
      '-o', 'BatchMode=yes',
    ];

    for (const option of options) {
      sshArgs.push('-o', option);
    }

    if (port !== undefined) {
      sshArgs.push('-p', String(port));
    }

    if (keyPath) {
      sshArgs.push('-i', keyPath);
    }

    // Hosts that already name a user win over the configured one
    const target = user && !host.includes('@') ? `${user}@${host}` : host;
    sshArgs.push(target, command);

    return sshArgs;
  }

  execute(command: string, host: string, sink: Writable): Promise<ExecutionOutcome> {
    return this.runSsh(this.buildArgs(host, command), sink);
  }

  async close(): Promise<void> {
    // Nothing to clean up for per-command SSH
  }

  private runSsh(args: string[], sink: Writable): Promise<ExecutionOutcome> {
    const { binary, commandTimeoutSeconds } = this.config;

    return new Promise((resolve) => {
      const proc = spawn(binary, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let settled = false;
      let timedOut = false;
      let timeout: NodeJS.Timeout | undefined;
      let sinkError: Error | null = null;

      // Output has nowhere to go: stop the command and drain what is left
      const onSinkError = (err: Error) => {
        sinkError ??= err;
        proc.stdout?.resume();
        proc.stderr?.resume();
        proc.kill();
      };

      const settle = (outcome: ExecutionOutcome) => {
        if (settled) return;
        settled = true;
        if (timeout) clearTimeout(timeout);
        sink.off('error', onSinkError);
        resolve(outcome);
      };

      if (commandTimeoutSeconds !== undefined) {
        timeout = setTimeout(() => {
          timedOut = true;
          proc.kill();
        }, commandTimeoutSeconds * 1000);
      }

      sink.on('error', onSinkError);
      proc.stdout?.pipe(sink, { end: false });
      proc.stderr?.pipe(sink, { end: false });

      proc.on('error', (err) => {
        settle(failure(`failed to launch ${binary}: ${err.message}`));
      });

      proc.on('close', (code, signal) => {
        if (sinkError) {
          settle(failure(`could not write output: ${sinkError.message}`, code));
        } else if (timedOut) {
          settle(failure(`${binary} command timed out after ${commandTimeoutSeconds}s`, code));
        } else if (code === 0) {
          settle({ status: 'success' });
        } else if (code !== null) {
          settle(failure(`exit status ${code}`, code));
        } else {
          settle(failure(`terminated by signal ${signal ?? 'unknown'}`));
        }
      });
    });
  }
}
