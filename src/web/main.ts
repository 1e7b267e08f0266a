#!/usr/bin/env node

/**
 * JSON API server.
 *
 * Usage:
 *   npm run web                  # Start on default port 3005
 *   PORT=8080 npm run web        # Custom port
 */

import { loadConfig } from '../core/config.js';
import { createRuntime } from '../runtime.js';
import { buildServer } from './server.js';

const runtime = createRuntime(loadConfig());
const server = buildServer({ ...runtime, cache: runtime.cache });

const shutdown = async () => {
  await server.close();
  runtime.close();
};
for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown().catch(err => runtime.logger.error({ err }, 'shutdown failed'));
  });
}

await server.listen({ port: runtime.config.port, host: '0.0.0.0' });

runtime.logger.info({ port: runtime.config.port }, `API listening on http://localhost:${runtime.config.port}/api/sources`);
