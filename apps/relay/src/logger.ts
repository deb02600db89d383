import { pino } from 'pino';
import { env } from './config/env.js';

export const logger = pino({
  level: env.NODE_ENV === 'test' ? 'silent' : env.LOG_LEVEL,
  base: { service: 'otp-relay' },
  redact: {
    paths: ['secret', 'pin', 'accessToken', 'credentials.secret', 'credentials.pin', 'req.headers["x-otp-webhook-secret"]'],
    censor: '[redacted]'
  }
});
