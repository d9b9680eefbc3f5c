/**
 * Service configuration: defaults, then environment, then command-line flags.
 */

import { z } from 'zod';
import { DEFAULT_POLL_INTERVAL_MS } from './automation/wait';
import { DEFAULT_HOST, DEFAULT_PORT } from './session';
import { DEFAULT_TIMEOUT } from './utils/adb';
import { LOG_LEVELS } from './utils/logger';

export const ServiceConfigSchema = z.object({
  port: z.coerce.number().int().default(DEFAULT_PORT),
  host: z.string().min(1).default(DEFAULT_HOST),
  deviceId: z.string().min(1).optional(),
  logLevel: z.enum(LOG_LEVELS).default('info'),
  waitPollIntervalMs: z.coerce.number().int().min(10).max(10000).default(DEFAULT_POLL_INTERVAL_MS),
  commandTimeoutMs: z.coerce.number().int().min(1000).max(120000).default(DEFAULT_TIMEOUT),
});

export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;

type ConfigKey = keyof ServiceConfig;

const SOURCES: { key: ConfigKey; flag: string; env: string }[] = [
  { key: 'port', flag: '--port', env: 'UI_AUTOMATOR_PORT' },
  { key: 'host', flag: '--host', env: 'UI_AUTOMATOR_HOST' },
  { key: 'deviceId', flag: '--device', env: 'ANDROID_SERIAL' },
  { key: 'logLevel', flag: '--log-level', env: 'UI_AUTOMATOR_LOG_LEVEL' },
  { key: 'waitPollIntervalMs', flag: '--poll-interval', env: 'UI_AUTOMATOR_POLL_INTERVAL_MS' },
  { key: 'commandTimeoutMs', flag: '--command-timeout', env: 'UI_AUTOMATOR_COMMAND_TIMEOUT_MS' },
];

export function parseArgValue(args: string[], key: string): string | undefined {
  const index = args.findIndex(value => value === key);
  if (index < 0) {
    const inline = args.find(value => value.startsWith(`${key}=`));
    return inline ? inline.slice(key.length + 1) : undefined;
  }
  return args[index + 1];
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value.trim() : undefined;
}

// Throws a ZodError naming the offending key when a value does not validate.
export function loadConfig(args: string[] = [], env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const raw: Partial<Record<ConfigKey, string>> = {};
  for (const source of SOURCES) {
    const value = nonEmpty(parseArgValue(args, source.flag)) ?? nonEmpty(env[source.env]);
    if (value !== undefined) {
      raw[source.key] = value;
    }
  }
  return ServiceConfigSchema.parse(raw);
}
