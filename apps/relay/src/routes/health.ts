import type { FastifyInstance, FastifyPluginOptions } from 'fastify';

export interface HealthRoutesOptions extends FastifyPluginOptions {
  isReady: () => boolean;
}

export async function healthRoutes(app: FastifyInstance, options: HealthRoutesOptions): Promise<void> {
  app.get('/health', async (_req, reply) => {
    if (!options.isReady()) {
      return reply.status(503).send({ status: 'not_ready', service: 'otp-relay' });
    }
    return reply.send({ status: 'healthy', service: 'otp-relay' });
  });
}
