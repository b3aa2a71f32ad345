/**
 * docpilot API Server
 *
 * @module @docpilot/api
 */

import { serve } from '@hono/node-server';
import { errorMessage } from '@docpilot/rag';
import { createApp } from './app';
import { createRuntime } from './bootstrap';
import { loadApiConfig } from './config';

async function main(): Promise<void> {
  const config = loadApiConfig();
  const runtime = await createRuntime(config);
  const app = createApp(runtime.services);

  const server = serve({ fetch: app.fetch, port: config.PORT }, (info) => {
    console.log(`[api] Listening on port ${info.port}`);
  });

  let stopping = false;
  const stop = (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.log(`[api] ${signal} received, shutting down`);

    server.close();
    runtime.shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error(`[api] Shutdown failed: ${errorMessage(error)}`);
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', () => stop('SIGINT'));
  process.on('SIGTERM', () => stop('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error(`[api] Failed to start: ${errorMessage(error)}`);
  process.exit(1);
});
