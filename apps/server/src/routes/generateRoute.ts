import type { FastifyInstance } from 'fastify';
import type { GenerationRequest, GenerationResult, PromptRelay } from '@prompt-relay/relay-core';

import type { ErrorDomainMapper } from '../errorDomainMapper.js';

export interface GenerateRouteDependencies {
  relay: PromptRelay;
  errorMapper: ErrorDomainMapper;
}

const generateBodySchema = {
  type: 'object',
  required: ['prompt'],
  properties: {
    prompt: { type: 'string' },
  },
} as const;

export function registerGenerateRoute(app: FastifyInstance, deps: GenerateRouteDependencies): void {
  app.post<{ Body: GenerationRequest }>(
    '/api/generate',
    { schema: { body: generateBodySchema } },
    async (request, reply) => {
      let result: GenerationResult;

      try {
        result = await deps.relay.generate(request.body.prompt);
      } catch (error) {
        const mapped = deps.errorMapper.map(error);

        if (mapped.errorCode === 'E_UNEXPECTED') {
          request.log.error({ err: error }, 'generate failed unexpectedly');
        } else {
          request.log.warn(
            { errorCode: mapped.errorCode, statusCode: mapped.statusCode, err: error },
            'upstream generate failed',
          );
        }

        return reply.code(mapped.statusCode).send({ detail: mapped.detail });
      }

      return reply.code(200).type('application/json; charset=utf-8').send(result.raw);
    },
  );
}
