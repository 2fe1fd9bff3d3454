import type { FastifyInstance } from 'fastify';
import type { JsonRecordStore } from '../services/record-store.js';

export type AdminRoutesOptions = {
  store: JsonRecordStore;
};

export async function adminRoutes(app: FastifyInstance, opts: AdminRoutesOptions): Promise<void> {
  app.post('/api/clear_all', async (req, reply) => {
    await opts.store.clearAll();
    req.log.warn('all_records_cleared');
    return reply.send({ ok: true });
  });
}
