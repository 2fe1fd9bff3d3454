import type { CallStatus, CallStats } from './types.js';

const TRANSITIONS: Record<CallStatus, readonly CallStatus[]> = {
  pending: ['calling', 'failed'],
  calling: ['completed', 'failed'],
  completed: [],
  failed: []
};

export function isTerminal(status: CallStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function canTransition(from: CallStatus, to: CallStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Resolves the status a record should hold after an update arrives.
 * Repeated, stale and out-of-order updates leave the current status in place.
 */
export function advanceCallStatus(
  current: CallStatus,
  incoming: CallStatus
): { nextState: CallStatus; changed: boolean } {
  if (canTransition(current, incoming)) {
    return { nextState: incoming, changed: true };
  }
  return { nextState: current, changed: false };
}

const PROVIDER_STATUS_MAP: Record<string, CallStatus> = {
  queued: 'calling',
  initiated: 'calling',
  ringing: 'calling',
  'in-progress': 'calling',
  answered: 'calling',
  completed: 'completed',
  busy: 'failed',
  'no-answer': 'failed',
  canceled: 'failed',
  failed: 'failed'
};

export function fromProviderStatus(providerStatus: string): CallStatus | undefined {
  return PROVIDER_STATUS_MAP[providerStatus.trim().toLowerCase()];
}

export function summarizeStatuses(statuses: CallStatus[]): CallStats {
  const counts: Record<CallStatus, number> = { pending: 0, calling: 0, completed: 0, failed: 0 };
  for (const status of statuses) {
    counts[status] += 1;
  }

  const total = statuses.length;
  return {
    total,
    ...counts,
    successRate: total > 0 ? `${((counts.completed / total) * 100).toFixed(1)}%` : '0%'
  };
}
