import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envBool = z.preprocess((value) => {
  if (typeof value === 'string') {
    return value.toLowerCase() === 'true' || value === '1';
  }
  return value;
}, z.boolean());

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().optional()
);

// setTimeout fires at once for anything above a signed 32-bit delay.
const MAX_TIMER_MS = 2_147_483_647;
const durationMs = z.coerce.number().int().min(0).max(MAX_TIMER_MS);

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  PORT: z.coerce.number().int().min(0).default(5000),
  OTP_API_HOST: z.string().default('0.0.0.0'),
  OTP_WEBHOOK_SECRET: optionalString,
  OTP_LENGTH: z.coerce.number().int().min(4).max(10).default(6),
  OTP_WAIT_TIMEOUT_MS: durationMs.positive().default(300_000),
  OTP_EXPIRATION_MS: durationMs.positive().default(300_000),
  OTP_PROMPT_TIMEOUT_MS: durationMs.positive().default(10_000),
  LOGIN_URL: optionalString,
  LOGIN_IDENTIFIER: optionalString,
  LOGIN_SECRET: z.string().default(''),
  LOGIN_PIN: optionalString,
  LOGIN_STATIC_OTP: optionalString,
  LOGIN_FLOW_FILE: optionalString,
  LOGIN_SUCCESS_TIMEOUT_MS: durationMs.positive().default(60_000),
  LOGIN_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  LOGIN_RETRY_DELAY_MS: durationMs.default(5_000),
  RUN_DEADLINE_MS: durationMs.positive().default(900_000),
  HEADLESS: envBool.default(false),
  BROWSER_CHANNEL: optionalString,
  BROWSER_EXECUTABLE_PATH: optionalString,
  BROWSER_TIMEOUT_MS: durationMs.positive().default(30_000),
  DIAGNOSTICS_DIR: z.string().default('diagnostics'),
  BACKEND_API_URL: z.string().url().default('http://localhost:8000'),
  BACKEND_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(4),
  BACKEND_BACKOFF_MS: durationMs.default(1_000),
  BACKEND_MAX_BACKOFF_MS: durationMs.default(15_000),
  BACKEND_TIMEOUT_MS: durationMs.positive().default(30_000),
  TOKEN_SOURCE: z.string().default('otp-relay')
});

export type Env = z.infer<typeof envSchema>;

export const env = envSchema.parse(process.env);
