import {
  GetCommandInvocationCommand,
  InvocationDoesNotExist,
  SSMClient,
  SendCommandCommand,
  type GetCommandInvocationCommandOutput,
} from '@aws-sdk/client-ssm';
import type { Writable } from 'stream';
import { failure, type ExecutionOutcome, type RemoteExecutor, type SsmTransportConfig } from './executor-interface.js';

const SHELL_DOCUMENT = 'AWS-RunShellScript';
const PENDING_STATUSES: ReadonlySet<string> = new Set(['Pending', 'InProgress', 'Delayed']);
// Slack on top of delivery + execution timeouts before we stop polling
const POLL_GRACE_MS = 60000;

/**
 * Runs commands on EC2 instances through SSM Run Command. Hosts are instance
 * ids. SSM only returns output once the invocation is terminal, so the sink
 * receives stdout then stderr in one go rather than as it is produced.
 */
export class SSMExecutor implements RemoteExecutor {
  readonly transport = 'ssm';
  private client: SSMClient;

  constructor(private config: SsmTransportConfig, client?: SSMClient) {
    this.client = client ?? new SSMClient({ region: config.region });
  }

  async execute(command: string, host: string, sink: Writable): Promise<ExecutionOutcome> {
    const { deliveryTimeoutSeconds, executionTimeoutSeconds, pollIntervalMs } = this.config;

    let commandId: string;
    try {
      const sent = await this.client.send(new SendCommandCommand({
        InstanceIds: [host],
        DocumentName: SHELL_DOCUMENT,
        TimeoutSeconds: deliveryTimeoutSeconds,
        Parameters: {
          commands: [command],
          executionTimeout: [String(executionTimeoutSeconds)],
        },
      }));
      if (!sent.Command?.CommandId) {
        return failure('SSM did not return a command id');
      }
      commandId = sent.Command.CommandId;
    } catch (err) {
      return failure(`failed to send command: ${errorMessage(err)}`);
    }

    const deadline = Date.now() + (deliveryTimeoutSeconds + executionTimeoutSeconds) * 1000 + POLL_GRACE_MS;

    while (Date.now() < deadline) {
      await sleep(pollIntervalMs);

      let invocation: GetCommandInvocationCommandOutput;
      try {
        invocation = await this.client.send(new GetCommandInvocationCommand({
          CommandId: commandId,
          InstanceId: host,
        }));
      } catch (err) {
        // The invocation is not visible for a short while after SendCommand
        if (err instanceof InvocationDoesNotExist) continue;
        return failure(`failed to query command ${commandId}: ${errorMessage(err)}`);
      }

      const status = invocation.Status ?? 'Pending';
      if (PENDING_STATUSES.has(status)) continue;

      if (invocation.StandardOutputContent) sink.write(invocation.StandardOutputContent);
      if (invocation.StandardErrorContent) sink.write(invocation.StandardErrorContent);

      const exitCode = invocation.ResponseCode ?? null;
      if (status === 'Success' && (exitCode === null || exitCode === 0)) {
        return { status: 'success' };
      }
      const detail = invocation.StatusDetails ?? status;
      return failure(exitCode === null || exitCode < 0 ? detail : `${detail} (exit status ${exitCode})`, exitCode);
    }

    return failure(`timed out waiting for command ${commandId}`);
  }

  async close(): Promise<void> {
    this.client.destroy();
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
