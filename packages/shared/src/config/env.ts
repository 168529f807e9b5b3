/**
 * Environment loading and validated configuration
 *
 * The .env file is looked up from this module's directory upwards, so every
 * package (and the CLI run from any working directory) reads the same file.
 */

import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join, resolve } from 'path';
import { existsSync } from 'fs';
import { z } from 'zod';
import type { DuplicateTxPolicy } from '@txledger/ledger';
import type { LogLevel } from '../logger.js';

/**
 * Find project root by looking for .env file
 * Starts from the given path and goes up
 */
export function findProjectRoot(startPath: string): string | null {
  let current = resolve(startPath);
  const root = resolve(current, '/');

  while (current !== root) {
    if (existsSync(join(current, '.env'))) {
      return current;
    }
    current = resolve(current, '..');
  }
  return null;
}

/**
 * Load environment variables from project root .env file
 * Falls back to the current working directory
 */
export function loadEnvFromRoot(): void {
  const projectRoot = findProjectRoot(dirname(fileURLToPath(import.meta.url)));

  if (projectRoot) {
    dotenv.config({ path: join(projectRoot, '.env') });
  } else {
    dotenv.config();
  }
}

const booleanString = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

/**
 * Zod schema for the environment variables read by the ledger tools
 */
export const EnvSchema = z.object({
  LOG_LEVEL: logLevelSchema.default('warn'),
  LOG_FILE: booleanString.default('false'),
  LOG_DIR: z.string().min(1).default('./logs'),
  LEDGER_OUTPUT_MODE: z.enum(['stream', 'summary']).default('stream'),
  LEDGER_DUPLICATE_TX_POLICY: z.enum(['overwrite', 'reject']).default('overwrite'),
  LEDGER_ENFORCE_OWNERSHIP: booleanString.default('false'),
  LEDGER_FREEZE_LOCKED: booleanString.default('false'),
});

export type OutputMode = 'stream' | 'summary';

export interface AppConfig {
  logLevel: LogLevel;
  logFile: boolean;
  logDir: string;
  outputMode: OutputMode;
  duplicateTxPolicy: DuplicateTxPolicy;
  enforceOwnership: boolean;
  freezeLockedAccounts: boolean;
}

/**
 * Load configuration from environment
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings behave like unset variables
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const parsed = EnvSchema.safeParse(present);

  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new Error(`Invalid configuration: ${keys}`);
  }

  const values = parsed.data;
  return {
    logLevel: values.LOG_LEVEL,
    logFile: values.LOG_FILE,
    logDir: values.LOG_DIR,
    outputMode: values.LEDGER_OUTPUT_MODE,
    duplicateTxPolicy: values.LEDGER_DUPLICATE_TX_POLICY,
    enforceOwnership: values.LEDGER_ENFORCE_OWNERSHIP,
    freezeLockedAccounts: values.LEDGER_FREEZE_LOCKED,
  };
}
