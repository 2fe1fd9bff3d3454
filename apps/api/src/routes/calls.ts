import { InvalidInputError } from '@autodialer/domain';
import type { FastifyInstance, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { CallService } from '../services/call-service.js';
import { splitNumberList } from '../utils/phone.js';
import { parseWith } from '../utils/validation.js';

export type CallRoutesOptions = {
  calls: CallService;
};

const uploadBody = z.union([
  z.string(),
  z.object({ numbers: z.array(z.string()) }),
  z.object({ numbersText: z.string() }),
  z.object({ numbers_text: z.string() })
]);

const aiCallBody = z
  .object({ text: z.string().optional(), command: z.string().optional() })
  .refine((body) => Boolean((body.text ?? body.command)?.trim()), { message: 'text is required' });

const bulkCallBody = z.object({ numbers: z.array(z.string()).optional() }).optional();

const callParams = z.object({ callId: z.string().min(1) });

function uploadEntries(body: z.infer<typeof uploadBody>): string[] {
  if (typeof body === 'string') {
    return splitNumberList(body);
  }
  if ('numbers' in body) {
    return body.numbers;
  }
  return splitNumberList('numbersText' in body ? body.numbersText : body.numbers_text);
}

/** A multipart upload carries the list as a CSV file in its `file` part. */
async function readUpload(req: FastifyRequest): Promise<string[]> {
  if (!req.isMultipart()) {
    return uploadEntries(parseWith(uploadBody, req.body));
  }

  const file = await req.file();
  if (!file || file.fieldname !== 'file') {
    throw new InvalidInputError('file is required');
  }
  const content = await file.toBuffer();
  return splitNumberList(content.toString('utf8'));
}

export async function callRoutes(app: FastifyInstance, opts: CallRoutesOptions): Promise<void> {
  const { calls } = opts;

  app.addContentTypeParser('text/csv', { parseAs: 'string' }, (_req, body, done) => {
    done(null, body);
  });

  app.post('/api/upload_numbers', async (req, reply) => {
    const entries = await readUpload(req);
    const result = await calls.uploadNumbers(entries);
    return reply.send({
      ok: true,
      count: result.count,
      duplicates: result.duplicates,
      rejected: result.rejected
    });
  });

  app.post('/api/ai_call', async (req, reply) => {
    const body = parseWith(aiCallBody, req.body);
    const { number, callId } = await calls.callFromText(body.text ?? body.command ?? '');
    return reply.send({ ok: true, number, callId });
  });

  app.post('/api/bulk_call', async (req, reply) => {
    const body = parseWith(bulkCallBody, req.body);
    const results = await calls.bulkCall(body?.numbers);
    return reply.send({
      ok: true,
      attempted: results.length,
      succeeded: results.filter((result) => result.ok).length,
      results
    });
  });

  app.post('/api/calls/:callId/refresh', async (req, reply) => {
    const { callId } = parseWith(callParams, req.params);
    const result = await calls.refreshStatus(callId);
    return reply.send({ ok: true, ...result });
  });

  app.get('/api/call_stats', async () => {
    return await calls.stats();
  });

  app.get('/api/export_calls', async (_req, reply) => {
    const csv = await calls.exportCsv();
    return reply
      .type('text/csv; charset=utf-8')
      .header('Content-Disposition', 'attachment; filename="call_logs.csv"')
      .send(csv);
  });

  app.get('/api/numbers', async () => {
    return { numbers: await calls.listNumbers() };
  });

  app.get('/api/call_logs', async () => {
    return { callLogs: await calls.listCallLogs() };
  });
}
