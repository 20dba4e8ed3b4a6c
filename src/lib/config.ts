import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors';
import { createLogger, levelFromEnv, setLogLevel } from './logger';
import { hrisRegionSchema, type HrisRegion } from './providers/merge-hris';

const log = createLogger('config');

export const CREDENTIAL_KEYS = ['MERGE_API_KEY', 'MERGE_ACCOUNT_TOKEN'] as const;

export type HrisConfig = {
  apiKey: string;
  accountToken: string;
  region: HrisRegion;
};

const requiredSecret = (name: string) =>
  z
    .string({ required_error: `${name} is not set` })
    .trim()
    .min(1, `${name} is empty`);

const hrisEnvSchema = z.object({
  MERGE_API_KEY: requiredSecret('MERGE_API_KEY'),
  MERGE_ACCOUNT_TOKEN: requiredSecret('MERGE_ACCOUNT_TOKEN'),
  MERGE_REGION: hrisRegionSchema.default('US'),
});

/** Never the value itself: '(empty)' or its length. */
export const describeSecret = (value: string | undefined) =>
  !value ? '(empty)' : `***${value.length} chars***`;

/**
 * `.env` in startDir, otherwise the nearest one in a parent directory.
 */
export function findEnvFile(startDir: string = process.cwd()): string | null {
  let dir = path.resolve(startDir);
  for (;;) {
    const candidate = path.join(dir, '.env');
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Loads the nearest .env into process.env. Variables already set in the process keep
 * their values. A missing or unreadable file only logs a warning.
 */
export function loadEnvironment(options: { startDir?: string } = {}): string | null {
  const startDir = options.startDir ?? process.cwd();
  const envPath = findEnvFile(startDir);
  if (!envPath) {
    log.warn(`.env file not found from ${startDir}`);
    return null;
  }

  log.info(`Loading .env file from: ${envPath}`);
  const { error, parsed } = dotenv.config({ path: envPath });
  if (error) {
    log.warn(`Could not parse .env file: ${error.message}`);
    log.warn('Continuing with existing environment variables...');
    return null;
  }
  // The logger picked its level before .env was read.
  setLogLevel(levelFromEnv());

  for (const key of CREDENTIAL_KEYS) {
    if (parsed && key in parsed) {
      log.info(`  ${key} = ${describeSecret(parsed[key])}`);
    }
  }
  return envPath;
}

export function readHrisConfig(env: NodeJS.ProcessEnv = process.env): HrisConfig {
  const result = hrisEnvSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) =>
      issue.path[0] === 'MERGE_REGION' ? `MERGE_REGION must be one of US, EU, APAC` : issue.message
    );
    throw new ConfigError(`Invalid HRIS configuration: ${problems.join('; ')}`);
  }

  const { MERGE_API_KEY, MERGE_ACCOUNT_TOKEN, MERGE_REGION } = result.data;
  return { apiKey: MERGE_API_KEY, accountToken: MERGE_ACCOUNT_TOKEN, region: MERGE_REGION };
}
