import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envBool = z.preprocess((value) => {
  if (typeof value === 'string') {
    return value.toLowerCase() === 'true' || value === '1';
  }
  return value;
}, z.boolean());

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional()
);

const commaList = z
  .string()
  .transform((value) => value.split(',').map((item) => item.trim()).filter(Boolean));

export const DEFAULT_CALL_MESSAGE =
  'Hello! This is an automated test call from the AI Autodialer system. ' +
  'This is a demonstration call for testing purposes. Thank you and goodbye!';

const schema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DATA_DIR: z.string().default('./data'),
  PUBLIC_BASE_URL: optionalString.pipe(z.string().url().optional()),
  TWILIO_ACCOUNT_SID: optionalString,
  TWILIO_AUTH_TOKEN: optionalString,
  TWILIO_PHONE_NUMBER: optionalString,
  TWILIO_VALIDATE_SIGNATURES: envBool.default(true),
  CALL_MESSAGE: z.string().default(DEFAULT_CALL_MESSAGE),
  GEMINI_API_KEY: optionalString,
  GEMINI_MODELS: commaList.default('gemini-2.0-flash,gemini-1.5-flash,gemini-1.5-pro'),
  GEMINI_BASE_URL: z.string().url().default('https://generativelanguage.googleapis.com')
});

export type Env = z.infer<typeof schema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = schema.safeParse(source);
  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed:\n${errors}`);
  }
  return result.data;
}

export const env = parseEnv(process.env);
