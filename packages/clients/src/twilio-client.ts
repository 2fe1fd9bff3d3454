import crypto from 'node:crypto';
import { TelephonyError, errorMessage } from '@autodialer/domain';

export interface TwilioCallOptions {
  to: string;
  /** TwiML document URL; takes precedence over `twiml`. */
  url?: string;
  twiml?: string;
  statusCallback?: string;
  statusCallbackEvents?: string[];
}

export interface TwilioCall {
  sid: string;
  status: string;
  durationSeconds: number | null;
}

interface TwilioCallResource {
  sid?: string;
  status?: string;
  duration?: string | number | null;
}

const DEFAULT_API_BASE = 'https://api.twilio.com';

export class TwilioClient {
  constructor(
    private readonly accountSid?: string,
    private readonly authToken?: string,
    private readonly fromPhone?: string,
    private readonly apiBase = DEFAULT_API_BASE
  ) {}

  isConfigured(): boolean {
    return Boolean(this.accountSid && this.authToken && this.fromPhone);
  }

  async createCall(options: TwilioCallOptions): Promise<TwilioCall> {
    if (!this.accountSid || !this.authToken || !this.fromPhone) {
      throw new TelephonyError('twilio_not_configured');
    }

    const form = new URLSearchParams({ To: options.to, From: this.fromPhone });
    if (options.url) {
      form.set('Url', options.url);
    } else if (options.twiml) {
      form.set('Twiml', options.twiml);
    }
    if (options.statusCallback) {
      form.set('StatusCallback', options.statusCallback);
      form.set('StatusCallbackMethod', 'POST');
      for (const event of options.statusCallbackEvents ?? ['completed']) {
        form.append('StatusCallbackEvent', event);
      }
    }

    const resource = await this.request('POST', '/Calls.json', form);
    return this.toCall(resource);
  }

  async fetchCall(callSid: string): Promise<TwilioCall> {
    const resource = await this.request('GET', `/Calls/${encodeURIComponent(callSid)}.json`);
    return this.toCall(resource);
  }

  validateSignature(url: string, params: Record<string, string>, signature?: string): boolean {
    if (!this.authToken) {
      return true;
    }
    if (!signature) {
      return false;
    }

    const data = Object.keys(params)
      .sort()
      .reduce((acc, key) => acc + key + params[key], url);

    const expected = Buffer.from(crypto.createHmac('sha1', this.authToken).update(data).digest('base64'));
    const received = Buffer.from(signature);
    return expected.length === received.length && crypto.timingSafeEqual(expected, received);
  }

  private async request(
    method: 'GET' | 'POST',
    path: string,
    form?: URLSearchParams
  ): Promise<TwilioCallResource> {
    if (!this.accountSid || !this.authToken) {
      throw new TelephonyError('twilio_not_configured');
    }

    const token = Buffer.from(`${this.accountSid}:${this.authToken}`).toString('base64');
    let res: Response;
    try {
      res = await fetch(`${this.apiBase}/2010-04-01/Accounts/${this.accountSid}${path}`, {
        method,
        headers: {
          Authorization: `Basic ${token}`,
          ...(form ? { 'Content-Type': 'application/x-www-form-urlencoded' } : {})
        },
        body: form
      });
    } catch (error) {
      throw new TelephonyError(`twilio_network_error:${errorMessage(error)}`, undefined, { cause: error });
    }

    if (!res.ok) {
      const text = await res.text();
      throw new TelephonyError(`twilio_request_failed:${res.status}:${text.slice(0, 200)}`, res.status);
    }

    return (await res.json()) as TwilioCallResource;
  }

  private toCall(resource: TwilioCallResource): TwilioCall {
    if (!resource.sid) {
      throw new TelephonyError('twilio_response_missing_sid');
    }

    const duration = resource.duration === null || resource.duration === undefined
      ? NaN
      : Number(resource.duration);

    return {
      sid: resource.sid,
      status: resource.status ?? 'queued',
      durationSeconds: Number.isFinite(duration) ? duration : null
    };
  }
}
