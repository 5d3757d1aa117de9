#!/usr/bin/env node

import { parseArgs } from 'util';
import { AttemptRecorder } from '../dispatch/attempt-recorder.js';
import { FleetAbortedError } from '../dispatch/errors.js';
import { FleetCoordinator } from '../dispatch/fleet-coordinator.js';
import type { RunSummary } from '../dispatch/types.js';
import { createLogger } from '../lib/logger.js';
import { applyOverrides, loadConfig } from './config.js';
import { createExecutor } from './executor-factory.js';
import { readLines } from './sources.js';

const USAGE = `
Usage: fleet-dispatch [options]

Runs every command from the commands file on one of the hosts from the hosts
file, retrying on another host when a command fails.

Options:
  --cmds <path>             Commands to run, one per line (default: cmds.txt)
  --hosts <path>            Hosts to run them on, one per line (default: hosts.txt)
  -c, --config <path>       YAML config file (transport, output, concurrency)
  -o, --output-dir <dir>    Directory for attempt and final output files
  --concurrency <n>         Maximum commands in flight (default: all at once)
  --connect-timeout <s>     SSH connection timeout in seconds (default: 2)
  --log-level <level>       Diagnostic log level (default: info)
  -h, --help                Show this help message

Output:
  cmd_<id>-attempt<n>.log   Output of each attempt
  cmd_<id>-final.log        Output of the attempt that succeeded

Examples:
  fleet-dispatch --cmds cmds.txt --hosts hosts.txt
  fleet-dispatch -c dispatch.yaml -o ./out --concurrency 8
`;

function parsePositiveInt(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${flag} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function printSummary(summary: RunSummary): void {
  const failedIds = summary.results
    .filter(r => r.outcome !== 'succeeded')
    .map(r => r.commandId);

  if (failedIds.length > 0) {
    console.log(`Failed command ids: ${failedIds.join(', ')}`);
  }
  console.log(`${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.total} total`);
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    options: {
      cmds: { type: 'string', default: 'cmds.txt' },
      hosts: { type: 'string', default: 'hosts.txt' },
      config: { type: 'string', short: 'c' },
      'output-dir': { type: 'string', short: 'o' },
      concurrency: { type: 'string' },
      'connect-timeout': { type: 'string' },
      'log-level': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
    allowPositionals: true,
  });

  if (values.help || positionals[0] === 'help') {
    console.log(USAGE);
    process.exit(0);
  }

  const config = applyOverrides(loadConfig(values.config), {
    outputDir: values['output-dir'],
    concurrency: parsePositiveInt('--concurrency', values.concurrency),
    connectTimeoutSeconds: parsePositiveInt('--connect-timeout', values['connect-timeout']),
  });

  const logger = createLogger({ level: values['log-level'] });

  // Load commands and hosts, run all the items until completion
  const commands = await readLines(values.cmds ?? 'cmds.txt');
  const hosts = await readLines(values.hosts ?? 'hosts.txt');

  const recorder = new AttemptRecorder(config.output.dir);
  await recorder.ensureOutputDir();

  const executor = createExecutor(config.transport);
  const coordinator = new FleetCoordinator({
    executor,
    recorder,
    logger,
    concurrency: config.concurrency,
  });

  let summary: RunSummary;
  try {
    summary = await coordinator.run(commands, hosts);
  } catch (err) {
    if (err instanceof FleetAbortedError) {
      printSummary(err.summary);
    }
    throw err;
  } finally {
    await executor.close();
    logger.flush();
  }

  printSummary(summary);
  if (summary.failed > 0) {
    process.exit(1);
  }
}

main().catch((err) => {
  console.error('Error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
