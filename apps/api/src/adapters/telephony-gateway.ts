import type { CallStatusSnapshot } from '@autodialer/domain';
import { InvalidInputError, TelephonyError, fromProviderStatus } from '@autodialer/domain';
import { TwilioClient } from '@autodialer/clients';
import { isE164 } from '../utils/phone.js';
import { sayTwiml } from '../utils/twiml.js';

export interface TelephonyGateway {
  isConfigured(): boolean;
  placeCall(number: string): Promise<string>;
  getCallStatus(callId: string): Promise<CallStatusSnapshot>;
  validateSignature(payload: { url: string; params: Record<string, string>; signature?: string }): boolean;
}

export interface TwilioGatewayConfig {
  accountSid?: string;
  authToken?: string;
  fromNumber?: string;
  /** Public origin of this server; enables TwiML URL and status callbacks. */
  publicBaseUrl?: string;
  callMessage: string;
  apiBase?: string;
}

export class TwilioTelephonyGateway implements TelephonyGateway {
  private readonly twilio: TwilioClient;

  constructor(private readonly config: TwilioGatewayConfig) {
    this.twilio = new TwilioClient(config.accountSid, config.authToken, config.fromNumber, config.apiBase);
  }

  isConfigured(): boolean {
    return this.twilio.isConfigured();
  }

  async placeCall(number: string): Promise<string> {
    if (!isE164(number)) {
      throw new InvalidInputError(`not an E.164 phone number: ${number}`);
    }

    const base = this.config.publicBaseUrl?.replace(/\/+$/, '');
    const call = await this.twilio.createCall({
      to: number,
      ...(base
        ? {
            url: `${base}/api/voice`,
            statusCallback: `${base}/api/call_status`,
            statusCallbackEvents: ['initiated', 'ringing', 'answered', 'completed']
          }
        : { twiml: sayTwiml(this.config.callMessage) })
    });
    return call.sid;
  }

  async getCallStatus(callId: string): Promise<CallStatusSnapshot> {
    const call = await this.twilio.fetchCall(callId);
    const status = fromProviderStatus(call.status);
    if (!status) {
      throw new TelephonyError(`twilio_unknown_call_status:${call.status}`);
    }
    return { status, providerStatus: call.status, durationSeconds: call.durationSeconds };
  }

  validateSignature(payload: { url: string; params: Record<string, string>; signature?: string }): boolean {
    return this.twilio.validateSignature(payload.url, payload.params, payload.signature);
  }
}
