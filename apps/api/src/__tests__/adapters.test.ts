import { describe, expect, it, vi } from 'vitest';
import { GeminiContentGenerator, buildArticlePrompt } from '../adapters/content-generator.js';
import { TwilioTelephonyGateway } from '../adapters/telephony-gateway.js';

function mockFetch(status: number, payload: unknown) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
    new Response(JSON.stringify(payload), { status })
  );
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

const twilioConfig = {
  accountSid: 'AC123',
  authToken: 'test-token',
  fromNumber: '+15550001111',
  callMessage: 'Hi there',
  apiBase: 'https://twilio.test'
};

describe('TwilioTelephonyGateway', () => {
  it('rejects numbers that are not E.164 before calling out', async () => {
    const fetchMock = mockFetch(201, { sid: 'CA1' });
    const gateway = new TwilioTelephonyGateway(twilioConfig);

    await expect(gateway.placeCall('8001234567')).rejects.toMatchObject({ code: 'invalid_input' });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('sends the message inline without a public base URL', async () => {
    const fetchMock = mockFetch(201, { sid: 'CA1', status: 'queued' });
    const gateway = new TwilioTelephonyGateway(twilioConfig);

    await expect(gateway.placeCall('+18001234567')).resolves.toBe('CA1');

    const form = new URLSearchParams(String(fetchMock.mock.calls[0][1]?.body));
    expect(form.get('Twiml')).toBe(
      '<?xml version="1.0" encoding="UTF-8"?><Response><Say voice="alice" language="en-US">Hi there</Say></Response>'
    );
    expect(form.get('StatusCallback')).toBeNull();
  });

  it('points the call at this server when a public base URL is set', async () => {
    const fetchMock = mockFetch(201, { sid: 'CA2', status: 'queued' });
    const gateway = new TwilioTelephonyGateway({ ...twilioConfig, publicBaseUrl: 'https://dialer.test/' });

    await gateway.placeCall('+18001234567');

    const form = new URLSearchParams(String(fetchMock.mock.calls[0][1]?.body));
    expect(form.get('Url')).toBe('https://dialer.test/api/voice');
    expect(form.get('Twiml')).toBeNull();
    expect(form.get('StatusCallback')).toBe('https://dialer.test/api/call_status');
    expect(form.getAll('StatusCallbackEvent')).toEqual(['initiated', 'ringing', 'answered', 'completed']);
  });

  it('maps provider statuses onto call statuses', async () => {
    mockFetch(200, { sid: 'CA1', status: 'no-answer', duration: '0' });
    const gateway = new TwilioTelephonyGateway(twilioConfig);

    await expect(gateway.getCallStatus('CA1')).resolves.toEqual({
      status: 'failed',
      providerStatus: 'no-answer',
      durationSeconds: 0
    });
  });

  it('reports missing credentials', () => {
    expect(new TwilioTelephonyGateway({ callMessage: 'Hi' }).isConfigured()).toBe(false);
    expect(new TwilioTelephonyGateway(twilioConfig).isConfigured()).toBe(true);
  });
});

describe('GeminiContentGenerator', () => {
  it('builds a prompt with the optional context line', () => {
    const withContext = buildArticlePrompt({ title: 'Queues', description: 'for beginners' });
    const withoutContext = buildArticlePrompt({ title: 'Queues', description: '' });

    expect(withContext.split('\n').slice(0, 4)).toEqual([
      'Write a comprehensive technical blog post about: Queues',
      '',
      'Context: for beginners',
      ''
    ]);
    expect(withoutContext).not.toContain('Context:');
    expect(withoutContext.endsWith('Write the complete article:')).toBe(true);
  });

  it('returns the generated text with a slug from the title', async () => {
    const fetchMock = mockFetch(200, { candidates: [{ content: { parts: [{ text: '## Queues\n\nBody' }] } }] });
    const generator = new GeminiContentGenerator({
      apiKey: 'test-key',
      models: ['model-a'],
      baseUrl: 'https://gemini.test'
    });

    const article = await generator.generateArticle({ title: 'Message Queues 101', description: '' });

    expect(article).toEqual({ body: '## Queues\n\nBody', slug: 'message-queues-101', model: 'model-a' });
    expect(fetchMock.mock.calls[0][0]).toBe('https://gemini.test/v1beta/models/model-a:generateContent');
  });
});
