import type { FastifyInstance } from 'fastify';
import { METRIC_DEFINITIONS, findMetric, type MetricDefinition } from '../../processing/metric-definitions.js';
import type { GatherOrchestrator } from '../../gather/orchestrator.js';
import type { SourceRegistry } from '../../gather/registry.js';
import type { ResponseCache } from '../../core/cache.js';

function serializeMetric(m: MetricDefinition) {
  return {
    id: m.id,
    display_name: m.display_name,
    category: m.category,
    unit_type: m.unit_type,
    aliases: m.aliases,
  };
}

export function registerMetaRoutes(
  server: FastifyInstance,
  registry: SourceRegistry,
  orchestrator: GatherOrchestrator,
  cache: ResponseCache | null
) {
  server.get('/api/metrics', async () => {
    return { metrics: METRIC_DEFINITIONS.map(serializeMetric) };
  });

  // Unknown names throw UnknownMetricError, mapped to 400
  server.get<{ Params: { name: string } }>('/api/metrics/:name', async request => {
    return serializeMetric(findMetric(request.params.name));
  });

  server.get('/api/sources', async () => {
    return {
      sources: registry.tags(),
      agents: orchestrator.agentDefaults(),
    };
  });

  server.get('/api/cache-stats', async () => {
    if (!cache) return { entries: 0, size_bytes: 0, size_mb: '0.0' };
    const stats = cache.stats();
    return {
      entries: stats.entries,
      size_bytes: stats.sizeBytes,
      size_mb: (stats.sizeBytes / 1024 / 1024).toFixed(1),
    };
  });
}
