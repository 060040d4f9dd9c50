import 'dotenv/config';
import process from 'node:process';

import { UpstreamRelay } from '@prompt-relay/relay-core';

import { loadServerConfig } from './config/serverConfig.js';
import { registerProcessObservers } from './observability/registerProcessObservers.js';
import { createServerApplication } from './serverApplication.js';

async function main(): Promise<void> {
  const config = loadServerConfig(process.env);

  const relay = new UpstreamRelay(config.upstreamUrl, {
    generateTimeoutMs: config.generateTimeoutMs,
    statusTimeoutMs: config.statusTimeoutMs,
  });

  const app = await createServerApplication({
    relay,
    staticDir: config.staticDir,
    logger: { level: config.logLevel },
  });

  registerProcessObservers({
    proc: process,
    logger: app.log,
    shutdown: () => app.close(),
  });

  if (!relay.isConfigured()) {
    app.log.warn('COLAB_API_URL is not set; generation requests will answer 503');
  }

  await app.listen({ host: config.host, port: config.port });
}

main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Fatal error starting prompt relay:', error);
  process.exitCode = 1;
});
