import { StorageError, errorMessage } from '@autodialer/domain';
import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { LockService } from './lock-service.js';
import { childLogger, type Logger } from './logger.js';
import {
  COLLECTIONS,
  recordSchemas,
  type CollectionName,
  type CollectionRecords
} from './record-schemas.js';

export type { CollectionName, CollectionRecords } from './record-schemas.js';

export interface Mutation<R, T> {
  records: R[];
  result: T;
  /** Skip the write when the mutation turned out to be a no-op. */
  changed?: boolean;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * File-backed collections, one JSON array per file under `dataDir`.
 * Every mutation rewrites the whole file inside a per-collection lock.
 */
export class JsonRecordStore {
  private readonly log: Logger;

  constructor(
    private readonly dataDir: string,
    logger: Logger,
    private readonly locks = new LockService()
  ) {
    this.log = childLogger(logger, 'record-store');
  }

  fileFor(collection: CollectionName): string {
    return path.join(this.dataDir, `${collection}.json`);
  }

  async load<C extends CollectionName>(collection: C): Promise<CollectionRecords[C][]> {
    let raw: string;
    try {
      raw = await readFile(this.fileFor(collection), 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw new StorageError(collection, `unreadable: ${errorMessage(error)}`, { cause: error });
    }

    if (!raw.trim()) {
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new StorageError(collection, `invalid JSON: ${errorMessage(error)}`, { cause: error });
    }

    const result = z.array<z.ZodType<CollectionRecords[C]>>(recordSchemas[collection]).safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new StorageError(collection, `invalid records at ${issue?.path.join('.') ?? '?'}: ${issue?.message ?? 'unknown'}`);
    }
    return result.data;
  }

  /** Read path for endpoints that must stay up when a file is damaged. */
  async list<C extends CollectionName>(collection: C): Promise<CollectionRecords[C][]> {
    try {
      return await this.load(collection);
    } catch (error) {
      if (error instanceof StorageError) {
        this.log.error({ err: error, collection }, 'collection_unreadable_serving_empty');
        return [];
      }
      throw error;
    }
  }

  async get<C extends CollectionName>(collection: C, id: string): Promise<CollectionRecords[C] | null> {
    const records = await this.load(collection);
    return records.find((record) => record.id === id) ?? null;
  }

  async save<C extends CollectionName>(collection: C, records: CollectionRecords[C][]): Promise<void> {
    await this.locks.runExclusive(collection, () => this.write(collection, records));
  }

  async update<C extends CollectionName, T>(
    collection: C,
    mutate: (records: CollectionRecords[C][]) => Mutation<CollectionRecords[C], T>
  ): Promise<T> {
    return await this.locks.runExclusive(collection, async () => {
      const current = await this.load(collection);
      const mutation = mutate(current);
      if (mutation.changed !== false) {
        await this.write(collection, mutation.records);
      }
      return mutation.result;
    });
  }

  async upsert<C extends CollectionName>(collection: C, record: CollectionRecords[C]): Promise<CollectionRecords[C]> {
    return await this.update(collection, (records) => {
      const index = records.findIndex((existing) => existing.id === record.id);
      if (index === -1) {
        records.push(record);
      } else {
        records[index] = record;
      }
      return { records, result: record };
    });
  }

  async delete(collection: CollectionName, id: string): Promise<boolean> {
    return await this.update(collection, (records) => {
      const remaining = records.filter((record) => record.id !== id);
      const removed = remaining.length !== records.length;
      return { records: remaining, result: removed, changed: removed };
    });
  }

  async clear(collection: CollectionName): Promise<void> {
    await this.save(collection, []);
  }

  async clearAll(): Promise<void> {
    for (const collection of COLLECTIONS) {
      await this.clear(collection);
    }
    this.log.info('all_collections_cleared');
  }

  async counts(): Promise<Record<CollectionName, number>> {
    const counts: Record<CollectionName, number> = { phone_numbers: 0, call_logs: 0, blog_posts: 0 };
    for (const collection of COLLECTIONS) {
      counts[collection] = (await this.list(collection)).length;
    }
    return counts;
  }

  private async write<C extends CollectionName>(collection: C, records: CollectionRecords[C][]): Promise<void> {
    const file = this.fileFor(collection);
    const tmp = `${file}.${randomUUID()}.tmp`;

    try {
      await mkdir(this.dataDir, { recursive: true });
      await writeFile(tmp, `${JSON.stringify(records, null, 2)}\n`, 'utf8');
      await rename(tmp, file);
    } catch (error) {
      await rm(tmp, { force: true }).catch((cleanupError: unknown) => {
        this.log.warn({ err: cleanupError, tmp }, 'temp_file_cleanup_failed');
      });
      throw new StorageError(collection, `write failed: ${errorMessage(error)}`, { cause: error });
    }

    this.log.debug({ collection, count: records.length }, 'collection_saved');
  }
}
