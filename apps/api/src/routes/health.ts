import type { FastifyInstance } from 'fastify';
import type { ContentGenerator } from '../adapters/content-generator.js';
import type { TelephonyGateway } from '../adapters/telephony-gateway.js';
import type { JsonRecordStore } from '../services/record-store.js';

export type HealthRoutesOptions = {
  store: JsonRecordStore;
  telephony: TelephonyGateway;
  generator: ContentGenerator;
};

export async function healthRoutes(app: FastifyInstance, opts: HealthRoutesOptions): Promise<void> {
  const { store, telephony, generator } = opts;

  // Reports configuration presence only; no provider is contacted.
  app.get('/api/health', async () => {
    const counts = await store.counts();
    return {
      ok: true,
      service: 'api',
      telephony: { configured: telephony.isConfigured() },
      generation: {
        configured: generator.isConfigured(),
        model: generator.isConfigured() ? generator.activeModel() ?? null : null
      },
      storage: {
        backend: 'json',
        phoneNumbers: counts.phone_numbers,
        callLogs: counts.call_logs,
        blogPosts: counts.blog_posts
      }
    };
  });
}
