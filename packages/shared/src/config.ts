// Shared configuration

import { z } from 'zod';

// 20-byte hex EVM address (checksum not enforced)
const evmAddress = z
  .string()
  .regex(/^0x[0-9a-fA-F]{40}$/, { message: 'Invalid EVM address (expected 0x + 40 hex chars)' });

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

const ConfigSchema = z.object({
  // Aurora JSON-RPC endpoint used to simulate contract calls
  AURORA_RPC_URL: z.string().url().default('http://localhost:8545'),

  // Contract the protocol runs as, and the account calling it
  XCC_CONTRACT_ADDRESS: evmAddress.optional(),
  XCC_SENDER_ADDRESS: evmAddress.optional(),

  // RPC request timeout (ms)
  RPC_TIMEOUT: z.coerce.number().int().positive().default(30000),

  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Config = z.infer<typeof ConfigSchema>;
export type LogLevel = Config['LOG_LEVEL'];

let _config: Config | null = null;

/** Parse configuration from an environment map without caching */
export function loadConfig(env: Record<string, string | undefined>): Config {
  return ConfigSchema.parse(env);
}

export function getConfig(): Config {
  if (!_config) {
    _config = loadConfig(process.env);
  }
  return _config;
}

const LogLevelSchema = z.enum(LOG_LEVELS).catch('info');

/** Read LOG_LEVEL alone; unknown or missing values mean `info` */
export function logLevelFrom(env: Record<string, string | undefined>): LogLevel {
  return LogLevelSchema.parse(env.LOG_LEVEL);
}
