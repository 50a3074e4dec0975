import { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import {
  EnqueueResponse,
  ErrorResponse,
  ExportFormat,
  JOB_STATUSES,
  JobRecord,
  JobSummary,
  JobView
} from '@voxqueue/shared';
import { IJobLedger, safeBaseName } from '@voxqueue/client';
import { ServerDeps } from '../context';
import { parseOneOf, toJobSummary, toJobView } from '../utils/helper';

const listQuerySchema = z.object({
  status: z.string().optional()
});

const EXPORT_FORMATS = Object.values(ExportFormat);
const LIST_FILTERS = [...JOB_STATUSES, 'running'] as const;

type IdParams = { Params: { id: string } };

function jobsMatching(ledger: IJobLedger, filter: (typeof LIST_FILTERS)[number] | undefined): JobRecord[] {
  switch (filter) {
    case undefined:
      return ledger.list();
    case 'queued':
      return ledger.queued();
    case 'running':
      return ledger.running();
    case 'completed':
      return ledger.completed();
    case 'failed':
      return ledger.failed();
    default:
      return ledger.list().filter(job => job.status === filter);
  }
}

export function jobRoutes(deps: ServerDeps): FastifyPluginAsync {
  const { orchestrator, ledger, exporter } = deps;

  return async server => {
    /**
     * ROUTE: GET /jobs?status=
     */
    server.get<{ Querystring: unknown; Reply: JobSummary[] | ErrorResponse }>('/jobs', async (req, reply) => {
      const query = listQuerySchema.safeParse(req.query ?? {});
      if (!query.success) return reply.status(400).send({ error: 'Invalid query' });

      const filter = parseOneOf(query.data.status, LIST_FILTERS);
      if (query.data.status !== undefined && filter === undefined) {
        return reply.status(400).send({ error: `Unknown status: ${query.data.status}` });
      }
      return jobsMatching(ledger, filter).map(toJobSummary);
    });

    /**
     * ROUTE: GET /jobs/:id
     */
    server.get<IdParams & { Reply: JobView | ErrorResponse }>('/jobs/:id', async (req, reply) => {
      const job = orchestrator.get(req.params.id);
      if (!job) return reply.status(404).send({ error: 'Job not found' });
      return toJobView(job);
    });

    server.post<IdParams & { Reply: EnqueueResponse | ErrorResponse }>('/jobs/:id/retry', async (req, reply) => {
      const job = orchestrator.get(req.params.id);
      if (!job) return reply.status(404).send({ error: 'Job not found' });
      if (!orchestrator.retry(job.id)) {
        return reply.status(409).send({ error: `Job is ${job.status}; only failed jobs can be retried` });
      }
      return { success: true, jobId: job.id, message: 'Job re-queued.' };
    });

    server.post<IdParams & { Reply: EnqueueResponse | ErrorResponse }>('/jobs/:id/cancel', async (req, reply) => {
      const job = orchestrator.get(req.params.id);
      if (!job) return reply.status(404).send({ error: 'Job not found' });
      if (!(await orchestrator.cancel(job.id))) {
        return reply.status(409).send({ error: `Job is ${job.status} and cannot be cancelled` });
      }
      return { success: true, jobId: job.id, message: 'Job cancelled.' };
    });

    server.delete<IdParams & { Reply: EnqueueResponse | ErrorResponse }>('/jobs/:id', async (req, reply) => {
      if (!(await orchestrator.removeJob(req.params.id))) {
        return reply.status(404).send({ error: 'Job not found' });
      }
      return { success: true, jobId: req.params.id, message: 'Job removed.' };
    });

    /**
     * ROUTE: GET /jobs/:id/export/:format
     * Returns the rendered transcript as an attachment.
     */
    server.get<{ Params: { id: string; format: string } }>('/jobs/:id/export/:format', async (req, reply) => {
      const format = parseOneOf(req.params.format, EXPORT_FORMATS);
      if (!format) return reply.status(400).send({ error: `Unknown export format: ${req.params.format}` });

      const job = orchestrator.get(req.params.id);
      if (!job) return reply.status(404).send({ error: 'Job not found' });
      if (job.status !== 'completed' || !job.result) {
        return reply.status(409).send({ error: `Job is ${job.status}; only completed jobs can be exported` });
      }

      const payload = exporter.export(job.result, format, safeBaseName(job.filename));
      return reply
        .header('content-type', `${payload.mimeType}; charset=utf-8`)
        .header('content-disposition', `attachment; filename="${payload.filename}"`)
        .send(payload.content);
    });
  };
}
