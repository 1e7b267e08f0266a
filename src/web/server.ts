import Fastify, { type FastifyInstance } from 'fastify';
import { silentLogger, type Logger } from '../core/logger.js';
import type { ResponseCache } from '../core/cache.js';
import type { GatherOrchestrator } from '../gather/orchestrator.js';
import type { SourceRegistry } from '../gather/registry.js';
import type { FundamentalsDeps } from '../sources/fundamentals.js';
import { registerFundamentalsRoutes } from './routes/fundamentals.js';
import { registerGatherRoutes } from './routes/gather.js';
import { registerMetaRoutes } from './routes/meta.js';
import { toApiError } from './serialization.js';

/**
 * JSON API over the gather runtime. Built without listening so tests can
 * drive it with inject().
 */

export interface ServerDeps {
  fundamentals: FundamentalsDeps;
  orchestrator: GatherOrchestrator;
  registry: SourceRegistry;
  cache?: ResponseCache | null;
  logger?: Logger;
}

export function buildServer(deps: ServerDeps): FastifyInstance {
  const logger = (deps.logger ?? silentLogger).child({ component: 'web' });
  const server = Fastify({ logger: false });

  registerFundamentalsRoutes(server, deps.fundamentals);
  registerGatherRoutes(server, deps.orchestrator);
  registerMetaRoutes(server, deps.registry, deps.orchestrator, deps.cache ?? null);

  // Global error handler
  server.setErrorHandler((error: Error, request, reply) => {
    const apiError = toApiError(error);
    logger.error({ url: request.url, err: error.message }, 'request failed');
    reply.status(apiError.status).send(apiError.body);
  });

  return server;
}
