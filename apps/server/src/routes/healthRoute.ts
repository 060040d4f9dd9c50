import type { FastifyInstance } from 'fastify';
import type { PromptRelay } from '@prompt-relay/relay-core';

export interface HealthResponse {
  status: 'ok';
  colab_url_configured: boolean;
}

export function registerHealthRoute(app: FastifyInstance, deps: { relay: PromptRelay }): void {
  app.get('/health', async (): Promise<HealthResponse> => ({
    status: 'ok',
    colab_url_configured: deps.relay.isConfigured(),
  }));
}
