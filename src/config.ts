import * as dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config(); // picks up a local .env during development

const EnvSchema = z.object({
  CRICKET_DB_PATH: z.string().min(1).default('ipl.db'),
  CRICKET_DATA_DIR: z.string().min(1).default('data'),
  CRICKET_DEBUG: z
    .enum(['true', 'false', '1', '0', ''])
    .default('false')
    .transform((value) => value === 'true' || value === '1'),
});

export interface Config {
  dbPath: string;
  dataDir: string;
  debug: boolean;
}

export function readConfig(env: NodeJS.ProcessEnv): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment: ${detail}`);
  }
  return {
    dbPath: parsed.data.CRICKET_DB_PATH,
    dataDir: parsed.data.CRICKET_DATA_DIR,
    debug: parsed.data.CRICKET_DEBUG,
  };
}

export const config: Config = readConfig(process.env);

export const SERVER_INFO = {
  name: 'cricket-stats-mcp',
  version: '1.0.0',
  description: 'IPL cricket statistics over ball-by-ball match data',
} as const;

export const PROTOCOL_VERSION = '2024-11-05';
