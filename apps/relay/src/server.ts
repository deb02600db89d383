import Fastify, { type FastifyBaseLogger, type FastifyError, type FastifyInstance } from 'fastify';
import { healthRoutes } from './routes/health.js';
import { otpRoutes } from './routes/otp.js';
import type { MailboxRegistry } from './services/mailbox-registry.js';

export interface ServerDeps {
  registry: MailboxRegistry;
  logger: FastifyBaseLogger;
  otpLength: number;
  webhookSecret?: string;
  isReady?: () => boolean;
}

export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const app = Fastify({ loggerInstance: deps.logger });

  // Notifiers do not always label their bodies; anything that is not JSON reaches the
  // route as a plain string and fails validation there.
  app.addContentTypeParser('*', { parseAs: 'string' }, (_req, body, done) => {
    done(null, body);
  });

  app.setErrorHandler((error: FastifyError, req, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      req.log.error({ error }, 'request_failed');
      return reply.status(500).send({ error: 'internal_error' });
    }
    return reply.status(statusCode).send({ error: statusCode === 400 ? 'invalid_body' : error.code });
  });

  await app.register(healthRoutes, { isReady: deps.isReady ?? (() => true) });
  await app.register(otpRoutes, {
    registry: deps.registry,
    otpLength: deps.otpLength,
    webhookSecret: deps.webhookSecret
  });

  return app;
}
