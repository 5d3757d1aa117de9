import { failure, type ExecutionOutcome } from '../runner/executor-interface.js';
import type { AttemptHandle } from './attempt-recorder.js';
import { CommandStoppedError } from './errors.js';
import { shuffledHostOrder } from './host-order.js';
import type { AttemptRecord, CommandJob, CompletionResult, DispatchDeps } from './types.js';

export interface DispatchOptions extends DispatchDeps {
  // Once aborted, no new attempt is started for this command
  signal?: AbortSignal;
}

/**
 * Dispatch one command to the fleet: try hosts in a random order, one at a
 * time, until one succeeds or every host has failed. Each attempt's output is
 * recorded; the successful one is promoted to the command's final artifact.
 *
 * Resolves with the command's completion result. Rejects with a
 * CommandStoppedError, carrying the attempts made so far, only when an attempt
 * artifact cannot be created or written.
 */
export async function dispatchCommand(
  job: CommandJob,
  hosts: readonly string[],
  options: DispatchOptions
): Promise<CompletionResult> {
  const { executor, recorder, random, signal } = options;
  const log = options.logger.child({ commandId: job.id });
  const attempts: AttemptRecord[] = [];

  if (hosts.length === 0) {
    log.error('FAILED: no hosts available, command cannot be satisfied');
    return { commandId: job.id, outcome: 'exhausted', attempts };
  }

  const order = shuffledHostOrder(hosts.length, random);

  for (const index of order) {
    if (signal?.aborted) {
      log.warn({ attempts: attempts.length }, 'ABORTED: fleet is shutting down, no further attempts');
      return { commandId: job.id, outcome: 'aborted', attempts };
    }

    const host = hosts[index];
    const sequence = attempts.length;
    let attempt: AttemptHandle;
    try {
      attempt = await recorder.beginAttempt(job.id, sequence);
    } catch (err) {
      throw new CommandStoppedError(job.id, attempts, toError(err));
    }

    log.info({ host, attempt: sequence, artifact: attempt.path }, 'EXEC');

    let outcome: ExecutionOutcome;
    try {
      outcome = await executor.execute(job.command, host, attempt.sink);
    } catch (err) {
      outcome = failure(toError(err).message);
    }

    try {
      await attempt.close();
    } catch (err) {
      const error = toError(err);
      attempts.push({
        commandId: job.id,
        sequence,
        host,
        outcome: 'failure',
        artifactPath: attempt.path,
        detail: `could not record output: ${error.message}`,
      });
      throw new CommandStoppedError(job.id, attempts, error);
    }

    if (outcome.status === 'failure') {
      attempts.push({
        commandId: job.id,
        sequence,
        host,
        outcome: 'failure',
        artifactPath: attempt.path,
        detail: outcome.detail,
      });
      log.warn({ host, attempt: sequence, exitCode: outcome.exitCode, detail: outcome.detail }, 'ERROR: attempt failed');
      continue;
    }

    attempts.push({
      commandId: job.id,
      sequence,
      host,
      outcome: 'success',
      artifactPath: attempt.path,
    });

    const promotion = await recorder.promote(job.id, attempt.path);
    if (!promotion.promoted) {
      log.error(
        { err: promotion.error, attemptArtifact: attempt.path },
        'ERROR: could not promote attempt artifact, final output remains in attempt artifact'
      );
    }

    log.info({ host, attempt: sequence, output: promotion.finalPath, promoted: promotion.promoted }, 'SUCC');
    return {
      commandId: job.id,
      outcome: 'succeeded',
      attempts,
      outputPath: promotion.finalPath,
      promoted: promotion.promoted,
    };
  }

  log.error({ hostsTried: attempts.length }, 'FAILED: exhausted all hosts');
  return { commandId: job.id, outcome: 'exhausted', attempts };
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
