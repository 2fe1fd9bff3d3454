import type { FastifyBaseLogger } from 'fastify';
import { pino } from 'pino';
import type { Env } from '../config/env.js';

export type Logger = FastifyBaseLogger;

export function createLogger(level: Env['LOG_LEVEL'] = 'info'): Logger {
  return pino({
    level,
    base: { service: 'api' },
    redact: ['req.headers.authorization', 'req.headers["x-twilio-signature"]']
  });
}

export function childLogger(parent: Logger, module: string): Logger {
  return parent.child({ module });
}
