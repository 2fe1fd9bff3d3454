import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildTestApp, type TestContext } from './helpers.js';

describe('GET /api/health', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await buildTestApp();
  });

  afterEach(async () => {
    await ctx.close();
  });

  it('reports configuration and record counts', async () => {
    await ctx.app.inject({ method: 'POST', url: '/api/upload_numbers', payload: { numbers: ['+18001234567'] } });

    const res = await ctx.app.inject({ method: 'GET', url: '/api/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      ok: true,
      service: 'api',
      telephony: { configured: true },
      generation: { configured: true, model: 'fake-model' },
      storage: { backend: 'json', phoneNumbers: 1, callLogs: 0, blogPosts: 0 }
    });
  });

  it('reports unconfigured providers', async () => {
    ctx.telephony.configured = false;
    ctx.generator.configured = false;

    const res = await ctx.app.inject({ method: 'GET', url: '/api/health' });

    expect(res.json()).toMatchObject({
      telephony: { configured: false },
      generation: { configured: false, model: null }
    });
  });

  it('stays up on a damaged collection while mutations fail', async () => {
    await writeFile(path.join(ctx.dataDir, 'phone_numbers.json'), 'not json', 'utf8');

    const health = await ctx.app.inject({ method: 'GET', url: '/api/health' });
    expect(health.statusCode).toBe(200);
    expect(health.json()).toMatchObject({ storage: { phoneNumbers: 0 } });

    const upload = await ctx.app.inject({
      method: 'POST',
      url: '/api/upload_numbers',
      payload: { numbers: ['+18001234567'] }
    });
    expect(upload.statusCode).toBe(500);
    expect(upload.json()).toMatchObject({ error: 'storage_error' });
  });
});
