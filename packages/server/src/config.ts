// Server configuration from environment variables

import { z } from 'zod';

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

/** Unset and blank variables both read as undefined. */
const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const flag = z
  .string()
  .optional()
  .transform((v) => TRUTHY.has((v ?? '').trim().toLowerCase()));

const EnvSchema = z.object({
  CROWDSIM_PORT: z.coerce.number().int().min(0).max(65_535).default(8000),
  CROWDSIM_HOST: z.string().trim().min(1).default('127.0.0.1'),
  CROWDSIM_LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CROWDSIM_API_KEY: optionalString,
  CROWDSIM_CORS_ORIGIN: z.string().trim().min(1).default('http://localhost:5173'),
  CROWDSIM_RESEARCH_MODE: flag,
  CROWDSIM_RESULTS_DIR: optionalString,
  CROWDSIM_STEP_DELAY_MS: z.coerce.number().int().min(0).max(60_000).default(0),
  HF_TOKEN: optionalString,
});

export interface ServerEnvConfig {
  port: number;
  host: string;
  logLevel: z.infer<typeof EnvSchema>['CROWDSIM_LOG_LEVEL'];
  apiKey: string | undefined;
  corsOrigin: string;
  researchMode: boolean;
  resultsDir: string | undefined;
  stepDelayMs: number;
  hfToken: string | undefined;
}

/** @throws Error listing every invalid variable */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerEnvConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid environment: ${problems.join('; ')}`);
  }
  const e = parsed.data;
  return {
    port: e.CROWDSIM_PORT,
    host: e.CROWDSIM_HOST,
    logLevel: e.CROWDSIM_LOG_LEVEL,
    apiKey: e.CROWDSIM_API_KEY,
    corsOrigin: e.CROWDSIM_CORS_ORIGIN,
    researchMode: e.CROWDSIM_RESEARCH_MODE,
    resultsDir: e.CROWDSIM_RESULTS_DIR,
    stepDelayMs: e.CROWDSIM_STEP_DELAY_MS,
    hfToken: e.HF_TOKEN,
  };
}
