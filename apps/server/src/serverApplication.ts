import fastifyCors from '@fastify/cors';
import Fastify, { type FastifyError, type FastifyInstance, type FastifyServerOptions } from 'fastify';
import type { PromptRelay } from '@prompt-relay/relay-core';

import { ErrorDomainMapper } from './errorDomainMapper.js';
import { registerFrontendRoutes } from './routes/frontendRoutes.js';
import { registerGenerateRoute } from './routes/generateRoute.js';
import { registerHealthRoute } from './routes/healthRoute.js';
import { registerStatusRoute } from './routes/statusRoute.js';

const UNREADABLE_BODY_CODES = new Set([
  'FST_ERR_CTP_INVALID_JSON_BODY',
  'FST_ERR_CTP_EMPTY_JSON_BODY',
  'FST_ERR_CTP_INVALID_MEDIA_TYPE',
]);

// Fastify 4's JSON parser rejects malformed input with a bare SyntaxError marked 400.
function isUnreadableBodyError(error: FastifyError): boolean {
  if (UNREADABLE_BODY_CODES.has(error.code)) {
    return true;
  }
  return error instanceof SyntaxError && error.statusCode === 400;
}

export interface ServerApplicationConfig {
  relay: PromptRelay;
  staticDir: string;
  logger?: FastifyServerOptions['logger'];
}

export async function createServerApplication(config: ServerApplicationConfig): Promise<FastifyInstance> {
  const app = Fastify({
    logger: config.logger ?? false,
    ajv: {
      customOptions: {
        // a numeric prompt is a client error, not a string
        coerceTypes: false,
      },
    },
  });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error.validation || isUnreadableBodyError(error)) {
      return reply.code(422).send({ detail: error.message });
    }

    const statusCode = error.statusCode !== undefined && error.statusCode >= 400 ? error.statusCode : 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, 'request failed');
      return reply.code(statusCode).send({ detail: 'Internal Server Error' });
    }

    return reply.code(statusCode).send({ detail: error.message });
  });

  await app.register(fastifyCors, {
    origin: '*',
    methods: ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
  });

  const errorMapper = new ErrorDomainMapper();

  registerHealthRoute(app, { relay: config.relay });
  registerGenerateRoute(app, { relay: config.relay, errorMapper });
  registerStatusRoute(app, { relay: config.relay });
  await registerFrontendRoutes(app, { staticDir: config.staticDir });

  return app;
}
