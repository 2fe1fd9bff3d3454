import path from 'node:path';
import { GeminiContentGenerator } from './adapters/content-generator.js';
import { TwilioTelephonyGateway } from './adapters/telephony-gateway.js';
import { buildServer } from './app.js';
import { env } from './config/env.js';
import { createLogger } from './services/logger.js';
import { JsonRecordStore } from './services/record-store.js';

const logger = createLogger(env.LOG_LEVEL);
const dataDir = path.resolve(env.DATA_DIR);

const store = new JsonRecordStore(dataDir, logger);
const telephony = new TwilioTelephonyGateway({
  accountSid: env.TWILIO_ACCOUNT_SID,
  authToken: env.TWILIO_AUTH_TOKEN,
  fromNumber: env.TWILIO_PHONE_NUMBER,
  publicBaseUrl: env.PUBLIC_BASE_URL,
  callMessage: env.CALL_MESSAGE
});
const generator = new GeminiContentGenerator({
  apiKey: env.GEMINI_API_KEY,
  models: env.GEMINI_MODELS,
  baseUrl: env.GEMINI_BASE_URL
});

if (!telephony.isConfigured()) {
  logger.warn('twilio_not_configured_calls_disabled');
}
if (!generator.isConfigured()) {
  logger.warn('gemini_not_configured_generation_disabled');
}

const app = await buildServer({
  store,
  telephony,
  generator,
  logger,
  callMessage: env.CALL_MESSAGE,
  publicBaseUrl: env.PUBLIC_BASE_URL,
  validateSignatures: env.TWILIO_VALIDATE_SIGNATURES
});

async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'shutting_down');
  await app.close();
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ err: error }, 'shutdown_failed');
      process.exit(1);
    });
  });
}

await app.listen({ port: env.PORT, host: env.HOST });
logger.info({ dataDir, port: env.PORT }, 'autodialer_api_started');
