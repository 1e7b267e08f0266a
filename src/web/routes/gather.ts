import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { GatherOrchestrator } from '../../gather/orchestrator.js';
import { serializeSummary, toApiError } from '../serialization.js';

const gatherBodySchema = z.object({
  ticker: z.string().min(1),
  name: z.string().min(1),
  agent: z.string().min(1),
  sources: z.array(z.string().min(1)).optional(),
  theme: z.string().min(1).optional(),
  directive: z.string().min(1).optional(),
  dry_run: z.boolean().optional(),
});

export function registerGatherRoutes(server: FastifyInstance, orchestrator: GatherOrchestrator) {
  server.post('/api/gather', async (request, reply) => {
    const body = gatherBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({
        error: {
          type: 'validation',
          message: body.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '),
        },
      });
    }

    const { ticker, name, agent, sources, theme, directive, dry_run } = body.data;
    try {
      const summary = await orchestrator.gather({
        ticker,
        companyName: name,
        agent,
        sources,
        theme,
        directive,
        dryRun: dry_run,
      });
      return reply.send(serializeSummary(summary));
    } catch (err) {
      const apiError = toApiError(err);
      return reply.status(apiError.status).send(apiError.body);
    }
  });
}
