import type { FastifyInstance } from 'fastify';
import type { PromptRelay, StatusResult } from '@prompt-relay/relay-core';

/** Always answers 200; reachability is reported in the body. */
export function registerStatusRoute(app: FastifyInstance, deps: { relay: PromptRelay }): void {
  app.get('/api/colab-status', async (request): Promise<StatusResult> => {
    const status = await deps.relay.checkStatus();

    if (!status.online) {
      request.log.info({ reason: status.reason }, 'upstream offline');
    }

    return status;
  });
}
