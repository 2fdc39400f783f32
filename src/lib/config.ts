/**
 * Ledger Configuration
 * Environment-driven settings for the ledger database, write retries and telemetry
 */

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';

const booleanSwitch = z
  .enum(['on', 'off', 'true', 'false', '1', '0'])
  .transform((value) => value === 'on' || value === 'true' || value === '1');

const envSchema = z.object({
  NODE_ENV: z.string().optional(),
  LEDGER_DB_PATH: z.string().min(1).default('data/parts-ledger.db'),
  LEDGER_BUSY_TIMEOUT_MS: z.coerce.number().int().min(0).default(5000),
  LEDGER_WRITE_RETRIES: z.coerce.number().int().min(1).max(10).default(3),
  LEDGER_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(100),
  LEDGER_MAX_OVER_RECEIVE_PERCENT: z.coerce.number().min(0).optional(),
  LEDGER_TELEMETRY: booleanSwitch.optional(),
});

export interface LedgerConfig {
  databasePath: string;
  busyTimeoutMs: number;
  writeRetries: number;
  retryBaseDelayMs: number;
  /** null means over-receiving is not capped */
  maxOverReceivePercent: number | null;
  telemetryEnabled: boolean;
}

/**
 * Parse ledger settings from an environment map.
 * Throws with every invalid variable listed when the environment is malformed.
 */
export function parseLedgerConfig(env: Record<string, string | undefined>): LedgerConfig {
  // Blank values behave like unset ones
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value.trim();
  }

  const result = envSchema.safeParse(cleaned);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid ledger configuration: ${problems}`);
  }

  const parsed = result.data;
  return {
    databasePath: parsed.LEDGER_DB_PATH,
    busyTimeoutMs: parsed.LEDGER_BUSY_TIMEOUT_MS,
    writeRetries: parsed.LEDGER_WRITE_RETRIES,
    retryBaseDelayMs: parsed.LEDGER_RETRY_BASE_DELAY_MS,
    maxOverReceivePercent: parsed.LEDGER_MAX_OVER_RECEIVE_PERCENT ?? null,
    telemetryEnabled: parsed.LEDGER_TELEMETRY ?? parsed.NODE_ENV !== 'test',
  };
}

let cachedConfig: LedgerConfig | null = null;

/**
 * Load configuration from `.env` (when present) and the process environment.
 * The result is cached; call `resetLedgerConfig` to read the environment again.
 */
export function loadLedgerConfig(): LedgerConfig {
  if (cachedConfig) return cachedConfig;
  loadDotenv();
  cachedConfig = parseLedgerConfig(process.env);
  return cachedConfig;
}

export function resetLedgerConfig(): void {
  cachedConfig = null;
}
