import * as fs from 'fs';
import * as yaml from 'yaml';
import { z } from 'zod';
import type { DispatchConfig } from './executor-interface.js';

const SshTransportSchema = z.object({
  type: z.literal('ssh'),
  binary: z.string().min(1).default('ssh'),
  user: z.string().min(1).optional(),
  port: z.number().int().positive().max(65535).optional(),
  keyPath: z.string().min(1).optional(),
  connectTimeoutSeconds: z.number().int().positive().default(2),
  commandTimeoutSeconds: z.number().int().positive().optional(),
  options: z.array(z.string().min(1)).default([]),
});

const SsmTransportSchema = z.object({
  type: z.literal('ssm'),
  region: z.string().min(1),
  // AWS rejects delivery timeouts below 30 seconds
  deliveryTimeoutSeconds: z.number().int().min(30).default(30),
  executionTimeoutSeconds: z.number().int().positive().default(3600),
  pollIntervalMs: z.number().int().nonnegative().default(1000),
});

const TransportSchema = z.discriminatedUnion('type', [
  SshTransportSchema,
  SsmTransportSchema,
]);

export const DispatchConfigSchema = z.object({
  transport: TransportSchema.default({ type: 'ssh' }),
  output: z.object({
    dir: z.string().min(1).default('.'),
  }).default({}),
  concurrency: z.number().int().positive().optional(),
});

export interface ConfigOverrides {
  outputDir?: string;
  concurrency?: number;
  connectTimeoutSeconds?: number;
}

function validate(raw: unknown, source: string): DispatchConfig {
  const result = DispatchConfigSchema.safeParse(raw ?? {});

  if (!result.success) {
    const errors = result.error.issues
      .map(issue => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid config (${source}):\n${errors}`);
  }

  return result.data;
}

export function loadConfig(configPath?: string): DispatchConfig {
  if (configPath === undefined) {
    return validate({}, 'defaults');
  }

  if (!fs.existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  const raw: unknown = yaml.parse(content);

  return validate(raw, configPath);
}

export function applyOverrides(config: DispatchConfig, overrides: ConfigOverrides): DispatchConfig {
  let transport = config.transport;
  if (overrides.connectTimeoutSeconds !== undefined) {
    if (transport.type !== 'ssh') {
      throw new Error('--connect-timeout only applies to the ssh transport');
    }
    transport = { ...transport, connectTimeoutSeconds: overrides.connectTimeoutSeconds };
  }

  return validate({
    ...config,
    transport,
    output: { dir: overrides.outputDir ?? config.output.dir },
    concurrency: overrides.concurrency ?? config.concurrency,
  }, 'command line');
}
