import type { FastifyInstance } from 'fastify';
import type { DelayAnalysisRequest } from '@delaylens/shared';
import { analyzeDocuments } from '../services/analysisService.js';
import { renderJsonReport, renderMarkdownReport } from '../services/reportRenderer.js';

// ─── JSON schema ─────────────────────────────────────────────────────────────

// Only the envelope is checked here; the documents themselves are validated by the
// schedule loader so that malformed exports report which input failed.
const delayAnalysisBodySchema = {
  body: {
    type: 'object',
    required: ['baseline', 'updated', 'criticalPath'],
    properties: {
      baseline: { type: 'object' },
      updated: { type: 'object' },
      criticalPath: { type: 'object' },
      scope: { type: 'string', enum: ['critical', 'all'] },
    },
    additionalProperties: false,
  },
};

// ─── Route plugin ─────────────────────────────────────────────────────────────

export default async function delayAnalysisRoutes(fastify: FastifyInstance) {
  /**
   * POST /api/delay-analysis
   * Compare a baseline schedule with an updated snapshot and return the JSON report.
   * Read-only: nothing is stored.
   */
  fastify.post<{ Body: DelayAnalysisRequest }>(
    '/',
    { schema: delayAnalysisBodySchema },
    async (request, reply) => {
      const { scope = fastify.config.defaultScope, ...documents } = request.body;
      const report = analyzeDocuments(documents, scope, new Date());

      request.log.info(
        { scope, ...report.summary, warnings: report.loadWarnings.length },
        'Delay analysis completed',
      );

      return reply.status(200).type('application/json; charset=utf-8').send(renderJsonReport(report));
    },
  );

  /**
   * POST /api/delay-analysis/markdown
   * Same analysis, rendered as the Markdown narrative report.
   */
  fastify.post<{ Body: DelayAnalysisRequest }>(
    '/markdown',
    { schema: delayAnalysisBodySchema },
    async (request, reply) => {
      const { scope = fastify.config.defaultScope, ...documents } = request.body;
      const report = analyzeDocuments(documents, scope, new Date());

      request.log.info({ scope, ...report.summary }, 'Delay analysis report rendered');

      return reply.status(200).type('text/markdown; charset=utf-8').send(renderMarkdownReport(report));
    },
  );
}
