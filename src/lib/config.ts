import { z } from 'zod';
import type { CheckConfig } from '../types/index.js';
import { ConfigError } from '../utils/errorUtils.js';

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);
const FALSY = new Set(['', '0', 'false', 'no', 'off']);

const envSchema = z.object({
  GROUP_CHECK_FORMAT: z.enum(['text', 'json']).default('text'),
  GROUP_CHECK_VERBOSE: z
    .string()
    .transform(v => v.trim().toLowerCase())
    .refine(v => TRUTHY.has(v) || FALSY.has(v), { message: 'expected a boolean such as "true" or "0"' })
    .transform(v => TRUTHY.has(v))
    .default('false'),
});

/**
 * Defaults for the checker from environment variables.
 * The bin entry loads .env into process.env first (dotenv).
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CheckConfig {
  const parsed = envSchema.safeParse({
    GROUP_CHECK_FORMAT: env.GROUP_CHECK_FORMAT || undefined,
    GROUP_CHECK_VERBOSE: env.GROUP_CHECK_VERBOSE,
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join('.') : 'environment';
    throw new ConfigError(`Invalid ${where}: ${issue?.message ?? 'unknown problem'}`);
  }
  return { format: parsed.data.GROUP_CHECK_FORMAT, verbose: parsed.data.GROUP_CHECK_VERBOSE };
}
