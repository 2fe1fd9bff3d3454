export * from './twilio-client.js';
export * from './gemini-client.js';
