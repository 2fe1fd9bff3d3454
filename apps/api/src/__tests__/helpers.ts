import type { ArticleRequest, CallStatusSnapshot, GeneratedArticle } from '@autodialer/domain';
import { GenerationError, InvalidInputError, TelephonyError, slugify } from '@autodialer/domain';
import type { FastifyInstance } from 'fastify';
import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { ContentGenerator } from '../adapters/content-generator.js';
import type { TelephonyGateway } from '../adapters/telephony-gateway.js';
import { buildServer } from '../app.js';
import { createLogger } from '../services/logger.js';
import { JsonRecordStore } from '../services/record-store.js';
import { isE164 } from '../utils/phone.js';

export class FakeTelephony implements TelephonyGateway {
  configured = true;
  signatureValid = true;
  readonly placed: string[] = [];
  readonly rejectedNumbers = new Set<string>();
  readonly statuses = new Map<string, CallStatusSnapshot>();
  /** When set, placements wait on it before answering. */
  hold: Promise<void> | undefined;
  inFlight = 0;

  isConfigured(): boolean {
    return this.configured;
  }

  async placeCall(number: string): Promise<string> {
    if (!isE164(number)) {
      throw new InvalidInputError(`not an E.164 phone number: ${number}`);
    }
    this.inFlight += 1;
    try {
      await this.hold;
    } finally {
      this.inFlight -= 1;
    }
    if (this.rejectedNumbers.has(number)) {
      throw new TelephonyError('twilio_request_failed:400:invalid destination', 400);
    }
    this.placed.push(number);
    return `CA${String(this.placed.length).padStart(4, '0')}`;
  }

  async getCallStatus(callId: string): Promise<CallStatusSnapshot> {
    const snapshot = this.statuses.get(callId);
    if (!snapshot) {
      throw new TelephonyError('twilio_request_failed:404:not found', 404);
    }
    return snapshot;
  }

  validateSignature(): boolean {
    return this.signatureValid;
  }
}

export class FakeGenerator implements ContentGenerator {
  configured = true;
  readonly failingTitles = new Set<string>();
  readonly requests: ArticleRequest[] = [];

  isConfigured(): boolean {
    return this.configured;
  }

  activeModel(): string | undefined {
    return 'fake-model';
  }

  async generateArticle(request: ArticleRequest): Promise<GeneratedArticle> {
    this.requests.push(request);
    if (this.failingTitles.has(request.title)) {
      throw new GenerationError('quota_exceeded', 'gemini_http_429:quota', 'fake-model');
    }
    return { body: `## ${request.title}\n\nGenerated body.`, slug: slugify(request.title), model: 'fake-model' };
  }
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

export async function makeDataDir(): Promise<string> {
  return await mkdtemp(path.join(os.tmpdir(), 'autodialer-test-'));
}

export interface TestContext {
  app: FastifyInstance;
  store: JsonRecordStore;
  telephony: FakeTelephony;
  generator: FakeGenerator;
  dataDir: string;
  close: () => Promise<void>;
}

export async function buildTestApp(options: { validateSignatures?: boolean } = {}): Promise<TestContext> {
  const dataDir = await makeDataDir();
  const logger = createLogger('silent');
  const store = new JsonRecordStore(dataDir, logger);
  const telephony = new FakeTelephony();
  const generator = new FakeGenerator();
  const app = await buildServer({
    store,
    telephony,
    generator,
    logger,
    callMessage: 'Test message',
    validateSignatures: options.validateSignatures ?? false
  });

  return {
    app,
    store,
    telephony,
    generator,
    dataDir,
    close: async () => {
      await app.close();
      await rm(dataDir, { recursive: true, force: true });
    }
  };
}
