import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { TelephonyGateway } from '../adapters/telephony-gateway.js';
import type { CallService } from '../services/call-service.js';
import { sayTwiml } from '../utils/twiml.js';
import { parseWith } from '../utils/validation.js';

export type WebhookRoutesOptions = {
  calls: CallService;
  telephony: TelephonyGateway;
  callMessage: string;
  publicBaseUrl?: string;
  validateSignatures: boolean;
};

const statusCallbackBody = z.record(z.string());

export async function webhookRoutes(app: FastifyInstance, opts: WebhookRoutesOptions): Promise<void> {
  const { calls, telephony } = opts;

  app.route({
    method: ['GET', 'POST'],
    url: '/api/voice',
    handler: async (_req, reply) => {
      return reply.type('text/xml').send(sayTwiml(opts.callMessage));
    }
  });

  app.post('/api/call_status', async (req, reply) => {
    const payload = parseWith(statusCallbackBody, req.body ?? {});

    if (opts.validateSignatures && telephony.isConfigured()) {
      const origin = opts.publicBaseUrl?.replace(/\/+$/, '') ?? `${req.protocol}://${req.headers.host}`;
      const signature = req.headers['x-twilio-signature'];
      if (!telephony.validateSignature({
        url: `${origin}${req.url}`,
        params: payload,
        signature: Array.isArray(signature) ? signature[0] : signature
      })) {
        return reply.status(403).send({ error: 'invalid_twilio_signature' });
      }
    }

    const callSid = payload.CallSid;
    if (!callSid) {
      return reply.status(400).send({ error: 'invalid_input', message: 'CallSid is required' });
    }

    const duration = Number.parseInt(payload.CallDuration ?? '', 10);
    const result = await calls.applyProviderStatus(
      callSid,
      payload.CallStatus ?? '',
      Number.isFinite(duration) ? duration : null
    );

    req.log.info({ callSid, callStatus: payload.CallStatus, updated: result?.changed ?? false }, 'twilio_status_callback');
    return reply.send({ ok: true, updated: result?.changed ?? false });
  });
}
