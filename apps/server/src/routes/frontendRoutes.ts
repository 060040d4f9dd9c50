import fastifyStatic from '@fastify/static';
import type { FastifyInstance } from 'fastify';

export async function registerFrontendRoutes(
  app: FastifyInstance,
  deps: { staticDir: string },
): Promise<void> {
  await app.register(fastifyStatic, {
    root: deps.staticDir,
    prefix: '/static/',
  });

  app.get('/', async (_request, reply) => reply.sendFile('index.html'));
}
