import crypto from 'node:crypto';
import type { FastifyInstance, FastifyPluginOptions } from 'fastify';
import { z } from 'zod';
import { maskOtp, normalizeOtp } from '@otp-relay/domain';
import type { MailboxRegistry } from '../services/mailbox-registry.js';

export interface OtpRoutesOptions extends FastifyPluginOptions {
  registry: MailboxRegistry;
  otpLength: number;
  webhookSecret?: string;
}

// No-code notifiers often send the code as a JSON number.
const otpBodySchema = z.object({
  otp: z.union([z.string(), z.number().int().nonnegative().transform(String)]),
  source: z.string().max(64).optional().catch(undefined)
});

function bodyError(body: unknown): 'otp_missing' | 'otp_invalid_format' {
  const otp = typeof body === 'object' && body !== null && 'otp' in body ? body.otp : undefined;
  return otp === undefined || otp === null ? 'otp_missing' : 'otp_invalid_format';
}

function secretMatches(expected: string | undefined, provided: string | string[] | undefined): boolean {
  if (!expected) {
    return true;
  }

  const value = Array.isArray(provided) ? provided[0] : provided;
  if (!value) {
    return false;
  }

  const a = Buffer.from(expected);
  const b = Buffer.from(value);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

export async function otpRoutes(app: FastifyInstance, options: OtpRoutesOptions): Promise<void> {
  app.addHook('onRequest', async (req, reply) => {
    if (!secretMatches(options.webhookSecret, req.headers['x-otp-webhook-secret'])) {
      return reply.status(403).send({ error: 'invalid_webhook_secret' });
    }
  });

  app.post('/api/otp', async (req, reply) => {
    const parsed = otpBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: bodyError(req.body) });
    }

    const otp = normalizeOtp(parsed.data.otp, options.otpLength);
    if (!otp.ok) {
      return reply.status(400).send({ error: otp.reason });
    }

    const mailbox = options.registry.active();
    const event = mailbox.deposit(otp.value);
    const expiresAt = mailbox.expiresAt(event);

    req.log.info(
      {
        otpHint: maskOtp(otp.value),
        source: parsed.data.source ?? 'webhook',
        runId: options.registry.activeRunId(),
        expiresAt: expiresAt.toISOString()
      },
      'otp_deposited'
    );

    return reply.send({
      status: 'success',
      message: 'OTP received successfully',
      expires_at: expiresAt.toISOString()
    });
  });

  app.get('/api/otp/status', async (_req, reply) => {
    const status = options.registry.active().status();
    return reply.send({
      pending: status.pending,
      received_at: status.receivedAt?.toISOString() ?? null,
      expires_at: status.expiresAt?.toISOString() ?? null,
      run_id: options.registry.activeRunId()
    });
  });

  app.post('/api/otp/clear', async (req, reply) => {
    const cleared = options.registry.active().clear();
    req.log.info({ cleared }, 'otp_cleared');
    return reply.send({ status: 'success', cleared });
  });
}
