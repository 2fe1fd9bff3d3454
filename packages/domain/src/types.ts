export type CallStatus = 'pending' | 'calling' | 'completed' | 'failed';

export const CALL_STATUSES: readonly CallStatus[] = ['pending', 'calling', 'completed', 'failed'];

export interface PhoneNumberRecord {
  id: string;
  number: string;
  status: CallStatus;
  createdAt: string;
  callId: string | null;
  calledAt: string | null;
  durationSeconds: number | null;
  lastError: string | null;
}

export interface CallLogRecord {
  id: string;
  number: string;
  callId: string | null;
  status: CallStatus;
  durationSeconds: number | null;
  startedAt: string;
  endedAt: string | null;
  error: string | null;
}

export interface BlogPostRecord {
  id: string;
  title: string;
  slug: string;
  description: string;
  body: string;
  model: string;
  createdAt: string;
  viewCount: number;
}

export interface CallStatusSnapshot {
  status: CallStatus;
  providerStatus: string;
  durationSeconds: number | null;
}

export interface GeneratedArticle {
  body: string;
  slug: string;
  model: string;
}

export interface ArticleRequest {
  title: string;
  description: string;
}

export interface CallStats {
  total: number;
  pending: number;
  calling: number;
  completed: number;
  failed: number;
  successRate: string;
}
