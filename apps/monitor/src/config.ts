import { join } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

function defaultDataDir(env: NodeJS.ProcessEnv): string {
  const base = env.XDG_DATA_HOME || join(homedir(), '.local', 'share');
  return join(base, 'battrack');
}

const configSchema = z.object({
  // Where history.json lives
  dataDir: z.string().min(1),

  // Logging
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type MonitorConfig = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): MonitorConfig {
  const result = configSchema.safeParse({
    dataDir: env.BATTRACK_DATA_DIR || defaultDataDir(env),
    logLevel: env.BATTRACK_LOG_LEVEL || undefined,
  });

  if (!result.success) {
    console.error('Configuration error:', result.error.format());
    throw new Error('INVALID_CONFIG');
  }

  return result.data;
}
