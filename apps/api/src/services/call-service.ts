import type { CallLogRecord, CallStats, CallStatus, PhoneNumberRecord } from '@autodialer/domain';
import {
  AppError,
  ConflictError,
  FeatureUnavailableError,
  InvalidInputError,
  InvalidTransitionError,
  NotFoundError,
  TelephonyError,
  advanceCallStatus,
  errorMessage,
  extractNumber,
  fromProviderStatus,
  isTerminal,
  summarizeStatuses
} from '@autodialer/domain';
import { randomUUID } from 'node:crypto';
import type { TelephonyGateway } from '../adapters/telephony-gateway.js';
import { toCsv } from '../utils/csv.js';
import { isE164, normalizePhoneE164Candidate } from '../utils/phone.js';
import { childLogger, type Logger } from './logger.js';
import type { JsonRecordStore, Mutation } from './record-store.js';

export const CALL_LOG_COLUMNS = [
  'id',
  'number',
  'callId',
  'status',
  'durationSeconds',
  'startedAt',
  'endedAt',
  'error'
] as const satisfies ReadonlyArray<keyof CallLogRecord>;

export interface UploadResult {
  count: number;
  duplicates: number;
  rejected: string[];
  numbers: PhoneNumberRecord[];
}

export interface CallOutcome {
  number: string;
  ok: boolean;
  callId?: string;
  status?: CallStatus;
  error?: string;
  message?: string;
}

export interface StatusUpdateResult {
  callId: string;
  status: CallStatus;
  changed: boolean;
}

interface StatusChange {
  record: PhoneNumberRecord;
  changed: boolean;
}

type PhonePatch = Partial<Pick<PhoneNumberRecord, 'callId' | 'calledAt' | 'durationSeconds' | 'lastError'>>;

function nowIso(): string {
  return new Date().toISOString();
}

export class CallService {
  private readonly log: Logger;
  /** Numbers whose placement request is in flight in this process. */
  private readonly dialing = new Set<string>();

  constructor(
    private readonly store: JsonRecordStore,
    private readonly telephony: TelephonyGateway,
    logger: Logger
  ) {
    this.log = childLogger(logger, 'call-service');
  }

  async uploadNumbers(entries: string[]): Promise<UploadResult> {
    const rejected: string[] = [];
    const valid: string[] = [];
    for (const entry of entries) {
      const number = normalizePhoneE164Candidate(entry);
      if (number) {
        valid.push(number);
      } else {
        rejected.push(entry);
      }
    }

    const result = await this.store.update('phone_numbers', (records) => {
      const known = new Set(records.map((record) => record.number));
      const added: PhoneNumberRecord[] = [];
      let duplicates = 0;

      for (const number of valid) {
        if (known.has(number)) {
          duplicates += 1;
          continue;
        }
        known.add(number);
        const record = this.newPhoneRecord(number);
        records.push(record);
        added.push(record);
      }

      return {
        records,
        result: { count: added.length, duplicates, rejected, numbers: added },
        changed: added.length > 0
      };
    });

    this.log.info({ added: result.count, duplicates: result.duplicates, rejected: rejected.length }, 'numbers_uploaded');
    return result;
  }

  async callFromText(text: string): Promise<{ number: string; callId: string }> {
    const number = extractNumber(text);
    if (!number) {
      throw new InvalidInputError('could not find a phone number in the command');
    }
    if (!isE164(number)) {
      throw new InvalidInputError(`not an E.164 phone number: ${number}`);
    }
    this.assertTelephonyConfigured();

    const callId = await this.claimAndDial(number, true);
    return { number, callId };
  }

  /**
   * Dials every pending number, or the given list, one after another.
   * A failing entry becomes a failed outcome and the loop moves on.
   */
  async bulkCall(numbers?: string[]): Promise<CallOutcome[]> {
    this.assertTelephonyConfigured();

    const targets = numbers
      ?? (await this.store.load('phone_numbers'))
        .filter((record) => record.status === 'pending' && !this.dialing.has(record.number))
        .map((record) => record.number);

    const outcomes: CallOutcome[] = [];
    for (const entry of targets) {
      outcomes.push(await this.callOne(entry, numbers !== undefined));
    }

    this.log.info(
      { attempted: outcomes.length, succeeded: outcomes.filter((outcome) => outcome.ok).length },
      'bulk_call_finished'
    );
    return outcomes;
  }

  async refreshStatus(callId: string): Promise<StatusUpdateResult> {
    this.assertTelephonyConfigured();
    const snapshot = await this.telephony.getCallStatus(callId);
    return await this.applyStatusUpdate(callId, snapshot.status, snapshot.durationSeconds);
  }

  /** Status callback entry point; unknown calls and statuses are ignored. */
  async applyProviderStatus(
    callId: string,
    providerStatus: string,
    durationSeconds: number | null
  ): Promise<StatusUpdateResult | null> {
    const status = fromProviderStatus(providerStatus);
    if (!status) {
      this.log.warn({ callId, providerStatus }, 'unknown_provider_status_ignored');
      return null;
    }

    try {
      return await this.applyStatusUpdate(callId, status, durationSeconds);
    } catch (error) {
      if (error instanceof NotFoundError) {
        this.log.warn({ callId }, 'status_update_for_unknown_call');
        return null;
      }
      throw error;
    }
  }

  async applyStatusUpdate(
    callId: string,
    incoming: CallStatus,
    durationSeconds: number | null
  ): Promise<StatusUpdateResult> {
    type StatusMutation = Mutation<PhoneNumberRecord, StatusChange | null>;
    const update = await this.store.update('phone_numbers', (records): StatusMutation => {
      const record = records.find((candidate) => candidate.callId === callId);
      if (!record) {
        return { records, result: null, changed: false };
      }

      const { nextState, changed } = advanceCallStatus(record.status, incoming);
      if (changed) {
        record.status = nextState;
        if (durationSeconds !== null) {
          record.durationSeconds = durationSeconds;
        }
      }
      return { records, result: { record: { ...record }, changed }, changed };
    });

    if (!update) {
      throw new NotFoundError('call', callId);
    }

    const { record, changed } = update;
    if (changed) {
      await this.appendLog({
        number: record.number,
        callId,
        status: record.status,
        durationSeconds: record.durationSeconds,
        startedAt: record.calledAt ?? nowIso(),
        endedAt: isTerminal(record.status) ? nowIso() : null,
        error: null
      });
      this.log.info({ callId, status: record.status }, 'call_status_updated');
    } else if (record.status !== incoming) {
      this.log.info({ callId, current: record.status, incoming }, 'stale_status_update_ignored');
    }

    return { callId, status: record.status, changed };
  }

  async stats(): Promise<CallStats> {
    const records = await this.store.list('phone_numbers');
    return summarizeStatuses(records.map((record) => record.status));
  }

  async exportCsv(): Promise<string> {
    const logs = await this.store.list('call_logs');
    return toCsv(CALL_LOG_COLUMNS, logs);
  }

  async listNumbers(): Promise<PhoneNumberRecord[]> {
    return await this.store.list('phone_numbers');
  }

  async listCallLogs(): Promise<CallLogRecord[]> {
    return await this.store.list('call_logs');
  }

  private async callOne(entry: string, register: boolean): Promise<CallOutcome> {
    try {
      const number = normalizePhoneE164Candidate(entry);
      if (!number) {
        throw new InvalidInputError(`not a phone number: ${entry}`);
      }

      const callId = await this.claimAndDial(number, register);
      return { number, ok: true, callId, status: 'calling' };
    } catch (error) {
      if (error instanceof AppError) {
        return {
          number: entry,
          ok: false,
          ...(error instanceof TelephonyError ? { status: 'failed' as const } : {}),
          error: error.code,
          message: error.message
        };
      }
      this.log.error({ err: error, number: entry }, 'bulk_call_item_crashed');
      return { number: entry, ok: false, error: 'internal_error', message: errorMessage(error) };
    }
  }

  /**
   * Marks the number as being dialed, checking under the collection lock that
   * it is still pending, then places the call.
   */
  private async claimAndDial(number: string, register: boolean): Promise<string> {
    await this.claim(number, register);
    try {
      return await this.dial(number);
    } finally {
      this.dialing.delete(number);
    }
  }

  private async claim(number: string, register: boolean): Promise<void> {
    type ClaimMutation = Mutation<PhoneNumberRecord, boolean>;
    const found = await this.store.update('phone_numbers', (records): ClaimMutation => {
      let record = records.find((candidate) => candidate.number === number);
      let created = false;
      if (!record) {
        if (!register) {
          return { records, result: false, changed: false };
        }
        record = this.newPhoneRecord(number);
        records.push(record);
        created = true;
      }

      this.assertDialable(record);
      this.dialing.add(number);
      return { records, result: true, changed: created };
    });

    if (!found) {
      throw new NotFoundError('phone_number', number);
    }
  }

  /**
   * Places one call for a claimed number. The phone record moves first, then
   * the call log entry is appended; a provider rejection fails the record and
   * logs the attempt.
   */
  private async dial(number: string): Promise<string> {
    const startedAt = nowIso();

    let callId: string;
    try {
      callId = await this.telephony.placeCall(number);
    } catch (error) {
      if (error instanceof TelephonyError) {
        await this.recordFailure(number, startedAt, error);
      }
      throw error;
    }

    await this.transitionPhone(number, 'calling', { callId, calledAt: startedAt, lastError: null });
    await this.appendLog({
      number,
      callId,
      status: 'calling',
      durationSeconds: null,
      startedAt,
      endedAt: null,
      error: null
    });
    this.log.info({ number, callId }, 'call_placed');
    return callId;
  }

  private async recordFailure(number: string, startedAt: string, error: TelephonyError): Promise<void> {
    this.log.warn({ number, err: error }, 'call_placement_failed');
    await this.transitionPhone(number, 'failed', { calledAt: startedAt, lastError: error.message });
    await this.appendLog({
      number,
      callId: null,
      status: 'failed',
      durationSeconds: null,
      startedAt,
      endedAt: nowIso(),
      error: error.message
    });
  }

  private async transitionPhone(number: string, next: CallStatus, patch: PhonePatch): Promise<void> {
    await this.store.update('phone_numbers', (records) => {
      const record = records.find((candidate) => candidate.number === number);
      if (!record) {
        this.log.warn({ number, next }, 'phone_record_missing_for_transition');
        return { records, result: undefined, changed: false };
      }

      const { nextState, changed } = advanceCallStatus(record.status, next);
      if (!changed) {
        this.log.warn({ number, current: record.status, next }, 'phone_transition_rejected');
        return { records, result: undefined, changed: false };
      }

      Object.assign(record, patch, { status: nextState });
      return { records, result: undefined };
    });
  }

  private async appendLog(entry: Omit<CallLogRecord, 'id'>): Promise<void> {
    await this.store.update('call_logs', (records) => {
      records.push({ id: randomUUID(), ...entry });
      return { records, result: undefined };
    });
  }

  private assertDialable(record: PhoneNumberRecord): void {
    if (this.dialing.has(record.number)) {
      throw new ConflictError('call_in_progress', `a call to ${record.number} is already being placed`);
    }
    if (record.status !== 'pending') {
      throw new InvalidTransitionError(record.status, 'calling');
    }
  }

  private assertTelephonyConfigured(): void {
    if (!this.telephony.isConfigured()) {
      throw new FeatureUnavailableError('telephony', 'Twilio credentials are not configured');
    }
  }

  private newPhoneRecord(number: string): PhoneNumberRecord {
    return {
      id: randomUUID(),
      number,
      status: 'pending',
      createdAt: nowIso(),
      callId: null,
      calledAt: null,
      durationSeconds: null,
      lastError: null
    };
  }
}
