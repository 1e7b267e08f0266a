import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { normalizeTicker } from '../../core/resolver.js';
import { gatherFundamentals, type FundamentalsDeps } from '../../sources/fundamentals.js';
import { serializeFundamentals } from '../serialization.js';

const paramsSchema = z.object({
  ticker: z.string().regex(/^\$?[A-Za-z][A-Za-z0-9.-]{0,9}$/, 'invalid ticker'),
});

const querySchema = z.object({
  company: z.string().min(1).optional(),
  theme: z.string().min(1).optional(),
  directive: z.string().min(1).optional(),
  markdown: z.enum(['true', 'false']).optional(),
});

export function registerFundamentalsRoutes(server: FastifyInstance, deps: FundamentalsDeps) {
  server.get('/api/fundamentals/:ticker', async (request, reply) => {
    const params = paramsSchema.safeParse(request.params);
    const query = querySchema.safeParse(request.query);
    if (!params.success || !query.success) {
      const issues = [...(params.error?.issues ?? []), ...(query.error?.issues ?? [])];
      return reply.status(400).send({
        error: { type: 'validation', message: issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ') },
      });
    }

    const ticker = normalizeTicker(params.data.ticker);
    const output = await gatherFundamentals(
      {
        ticker,
        companyName: query.data.company ?? ticker,
        theme: query.data.theme,
        directive: query.data.directive,
      },
      deps
    );

    return reply.send(serializeFundamentals(output, query.data.markdown !== 'false'));
  });
}
