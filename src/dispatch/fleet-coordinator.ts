import { CompletionChannel } from './completion-channel.js';
import { dispatchCommand } from './dispatch-engine.js';
import { CommandStoppedError, FleetAbortedError } from './errors.js';
import type { CommandJob, CompletionResult, DispatchDeps, RunSummary } from './types.js';

export interface FleetCoordinatorOptions extends DispatchDeps {
  // Maximum commands in flight; unbounded when omitted
  concurrency?: number;
}

export class FleetCoordinator {
  constructor(private options: FleetCoordinatorOptions) {}

  async run(commands: readonly string[], hosts: readonly string[]): Promise<RunSummary> {
    const { logger, concurrency } = this.options;
    if (concurrency !== undefined && (!Number.isInteger(concurrency) || concurrency < 1)) {
      throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }

    const channel = new CompletionChannel<CompletionResult>();
    const shutdown = new AbortController();
    const failure: { fatal: Error | null } = { fatal: null };

    const jobs: CommandJob[] = commands.map((command, id) => ({ id, command }));

    const launch = async (job: CommandJob): Promise<void> => {
      let result: CompletionResult;
      try {
        result = await dispatchCommand(job, hosts, { ...this.options, signal: shutdown.signal });
      } catch (err) {
        const stopped = err instanceof CommandStoppedError ? err : null;
        const error = stopped?.reason ?? (err instanceof Error ? err : new Error(String(err)));
        if (!failure.fatal) {
          failure.fatal = error;
          logger.fatal({ err: error, commandId: job.id }, 'fatal error, no new attempts will be started');
          shutdown.abort(error);
        }
        result = { commandId: job.id, outcome: 'aborted', attempts: stopped?.attempts ?? [] };
      }
      channel.send(result);
    };

    logger.info(
      { commands: jobs.length, hosts: hosts.length, concurrency: concurrency ?? 'unbounded' },
      'dispatching commands'
    );

    let tasks: Promise<void>[];
    if (concurrency === undefined) {
      tasks = jobs.map(job => launch(job));
    } else {
      const queue = [...jobs];
      const worker = async () => {
        for (let job = queue.shift(); job; job = queue.shift()) {
          await launch(job);
        }
      };
      tasks = Array.from({ length: Math.min(concurrency, jobs.length) }, () => worker());
    }

    // Wait for all to report in
    const results: CompletionResult[] = [];
    for (let left = 0; left < jobs.length; left++) {
      results.push(await channel.receive());
    }
    await Promise.all(tasks);

    results.sort((a, b) => a.commandId - b.commandId);
    const succeeded = results.filter(r => r.outcome === 'succeeded').length;
    const summary: RunSummary = {
      total: jobs.length,
      succeeded,
      failed: jobs.length - succeeded,
      results,
    };

    logger.info({ succeeded: summary.succeeded, failed: summary.failed, total: summary.total }, 'FINISHED');

    if (failure.fatal) {
      throw new FleetAbortedError(failure.fatal, summary);
    }
    return summary;
  }
}
