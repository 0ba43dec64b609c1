/**
 * Destination sinks: where one archive's records go
 *
 * - PerArchiveSink: one store file per archive, written under a staging
 *   name inside a single transaction and renamed into place on commit
 * - SharedStoreSink: one archive's view of the run-wide shared store;
 *   batches are flushed through SharedStoreWriter's single write queue
 *
 * @module main/database/sinks
 */

import { promises as fs, rmSync } from 'fs';
import path from 'path';
import { logger } from '../config/logger.js';
import { EmailStore, type BatchResult } from './EmailStore.js';
import type { EmailRecord } from '../../shared/types/index.js';

/**
 * Where the orchestrator writes one archive's records
 */
export interface ArchiveSink {
  /** Queue records; flushes whenever a full batch is buffered */
  write(records: EmailRecord[]): Promise<void>;

  /**
   * Flush and make the archive's records durable
   *
   * @returns Total records written for the archive
   */
  commit(): Promise<number>;

  /** Discard everything this sink wrote */
  abort(): Promise<void>;
}

/**
 * Store file of one archive in per-archive mode
 */
export function perArchiveStorePath(dbDir: string, stem: string): string {
  return path.join(dbDir, `${stem}.sqlite3`);
}

export class PerArchiveSink implements ArchiveSink {
  private readonly store: EmailStore;
  private readonly partialPath: string;
  private buffer: EmailRecord[] = [];
  private written = 0;

  constructor(
    readonly finalPath: string,
    private readonly batchSize: number
  ) {
    this.partialPath = `${finalPath}.partial`;
    // Leftovers from an interrupted run would otherwise be appended to
    rmSync(this.partialPath, { force: true });
    rmSync(`${this.partialPath}-journal`, { force: true });

    this.store = EmailStore.open(this.partialPath, { journalMode: 'DELETE' });
    this.store.begin();
  }

  async write(records: EmailRecord[]): Promise<void> {
    this.buffer.push(...records);
    if (this.buffer.length >= this.batchSize) {
      this.flush();
    }
  }

  async commit(): Promise<number> {
    this.flush();
    this.store.commit();
    this.store.close();
    await fs.rename(this.partialPath, this.finalPath);

    logger.debug('PerArchiveSink', 'Store finalized', { path: this.finalPath, records: this.written });
    return this.written;
  }

  async abort(): Promise<void> {
    this.buffer = [];
    this.store.close();
    await fs.rm(this.partialPath, { force: true });
    await fs.rm(`${this.partialPath}-journal`, { force: true });
  }

  private flush(): void {
    if (this.buffer.length === 0) {
      return;
    }
    const { inserted } = this.store.writeBatch(this.buffer);
    this.written += inserted;
    this.buffer = [];
  }
}

/**
 * Owner of the run-wide shared store
 *
 * Every write goes through one FIFO queue, so batches from concurrent
 * workers are committed one whole transaction at a time.
 */
export class SharedStoreWriter {
  private queue: Promise<void> = Promise.resolve();
  private closed = false;

  private constructor(readonly store: EmailStore) {}

  static open(filePath: string): SharedStoreWriter {
    return new SharedStoreWriter(EmailStore.open(filePath, { journalMode: 'WAL' }));
  }

  submit(records: EmailRecord[]): Promise<BatchResult> {
    return this.enqueue(() => this.store.writeBatch(records));
  }

  deleteFrom(sourcePst: string, fromId: number): Promise<number> {
    return this.enqueue(() => this.store.deleteFrom(sourcePst, fromId));
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.queue;
    this.store.close();
  }

  private enqueue<T>(task: () => T): Promise<T> {
    if (this.closed) {
      return Promise.reject(new Error('Shared store is closed'));
    }

    const result = this.queue.then(task);
    // The caller receives the failure through `result`; the queue itself keeps going
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

export class SharedStoreSink implements ArchiveSink {
  private buffer: EmailRecord[] = [];
  private written = 0;
  private firstId: number | null = null;

  constructor(
    private readonly writer: SharedStoreWriter,
    private readonly sourcePst: string,
    private readonly batchSize: number
  ) {}

  async write(records: EmailRecord[]): Promise<void> {
    this.buffer.push(...records);
    if (this.buffer.length >= this.batchSize) {
      await this.flush();
    }
  }

  async commit(): Promise<number> {
    await this.flush();
    return this.written;
  }

  async abort(): Promise<void> {
    this.buffer = [];
    if (this.firstId === null) {
      return;
    }

    const removed = await this.writer.deleteFrom(this.sourcePst, this.firstId);
    logger.debug('SharedStoreSink', 'Removed rows of aborted archive', { source: this.sourcePst, removed });
    this.firstId = null;
    this.written = 0;
  }

  private async flush(): Promise<void> {
    if (this.buffer.length === 0) {
      return;
    }
    const batch = this.buffer;
    this.buffer = [];

    const { inserted, firstId } = await this.writer.submit(batch);
    if (this.firstId === null) {
      this.firstId = firstId;
    }
    this.written += inserted;
  }
}
