import type { BlogPostRecord, CallLogRecord, PhoneNumberRecord } from '@autodialer/domain';
import { z } from 'zod';

const callStatus = z.enum(['pending', 'calling', 'completed', 'failed']);

export const phoneNumberRecordSchema: z.ZodType<PhoneNumberRecord> = z.object({
  id: z.string().min(1),
  number: z.string().min(1),
  status: callStatus,
  createdAt: z.string(),
  callId: z.string().nullable(),
  calledAt: z.string().nullable(),
  durationSeconds: z.number().nonnegative().nullable(),
  lastError: z.string().nullable()
});

export const callLogRecordSchema: z.ZodType<CallLogRecord> = z.object({
  id: z.string().min(1),
  number: z.string().min(1),
  callId: z.string().nullable(),
  status: callStatus,
  durationSeconds: z.number().nonnegative().nullable(),
  startedAt: z.string(),
  endedAt: z.string().nullable(),
  error: z.string().nullable()
});

export const blogPostRecordSchema: z.ZodType<BlogPostRecord> = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  slug: z.string().min(1),
  description: z.string(),
  body: z.string(),
  model: z.string(),
  createdAt: z.string(),
  viewCount: z.number().int().nonnegative()
});

export interface CollectionRecords {
  phone_numbers: PhoneNumberRecord;
  call_logs: CallLogRecord;
  blog_posts: BlogPostRecord;
}

export type CollectionName = keyof CollectionRecords;

export const COLLECTIONS: readonly CollectionName[] = ['phone_numbers', 'call_logs', 'blog_posts'];

export const recordSchemas: { [C in CollectionName]: z.ZodType<CollectionRecords[C]> } = {
  phone_numbers: phoneNumberRecordSchema,
  call_logs: callLogRecordSchema,
  blog_posts: blogPostRecordSchema
};
