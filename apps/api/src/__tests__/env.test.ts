import { describe, expect, it } from 'vitest';
import { DEFAULT_CALL_MESSAGE, parseEnv } from '../config/env.js';

describe('parseEnv', () => {
  it('applies defaults when nothing is set', () => {
    const env = parseEnv({});

    expect(env.PORT).toBe(3000);
    expect(env.DATA_DIR).toBe('./data');
    expect(env.TWILIO_VALIDATE_SIGNATURES).toBe(true);
    expect(env.CALL_MESSAGE).toBe(DEFAULT_CALL_MESSAGE);
    expect(env.GEMINI_MODELS).toEqual(['gemini-2.0-flash', 'gemini-1.5-flash', 'gemini-1.5-pro']);
    expect(env.TWILIO_ACCOUNT_SID).toBeUndefined();
    expect(env.PUBLIC_BASE_URL).toBeUndefined();
  });

  it('treats blank credentials as absent and parses lists and flags', () => {
    const env = parseEnv({
      PORT: '8080',
      TWILIO_ACCOUNT_SID: '   ',
      TWILIO_AUTH_TOKEN: 'test-secret',
      TWILIO_VALIDATE_SIGNATURES: 'false',
      GEMINI_MODELS: 'model-a, model-b,,',
      PUBLIC_BASE_URL: 'https://dialer.example.test'
    });

    expect(env.PORT).toBe(8080);
    expect(env.TWILIO_ACCOUNT_SID).toBeUndefined();
    expect(env.TWILIO_AUTH_TOKEN).toBe('test-secret');
    expect(env.TWILIO_VALIDATE_SIGNATURES).toBe(false);
    expect(env.GEMINI_MODELS).toEqual(['model-a', 'model-b']);
    expect(env.PUBLIC_BASE_URL).toBe('https://dialer.example.test');
  });

  it('fails with the offending variable named', () => {
    expect(() => parseEnv({ PORT: 'abc' })).toThrow(/Configuration validation failed:\n {2}PORT:/);
    expect(() => parseEnv({ PUBLIC_BASE_URL: 'not a url' })).toThrow(/PUBLIC_BASE_URL/);
  });
});
