import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { logger } from '../config/logger.js';
import type { EmailRecord } from '../../shared/types/index.js';

/**
 * Fixed schema of the emails table; kept column-for-column compatible
 * with stores written by earlier versions of the tool
 */
export const EMAILS_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS emails (
    id INTEGER PRIMARY KEY,
    subject TEXT,
    sender_name TEXT,
    sender_email TEXT,
    recipient_name TEXT,
    recipient_email TEXT,
    attachment_filename TEXT,
    attachment_type TEXT,
    email_date TEXT,
    source_pst TEXT
  )`;

const INSERT_SQL = `
  INSERT INTO emails (
    subject, sender_name, sender_email, recipient_name, recipient_email,
    attachment_filename, attachment_type, email_date, source_pst
  ) VALUES (
    @subject, @sender_name, @sender_email, @recipient_name, @recipient_email,
    @attachment_filename, @attachment_type, @email_date, @source_pst
  )`;

export type JournalMode = 'WAL' | 'DELETE';

export interface EmailStoreOptions {
  /** WAL for the long-lived shared store, DELETE for single-file per-archive stores */
  journalMode?: JournalMode;
}

/**
 * Result of one committed batch
 */
export interface BatchResult {
  inserted: number;

  /** Row id of the first inserted record, null for an empty batch */
  firstId: number | null;
}

/**
 * better-sqlite3 connection wrapper for one destination store
 *
 * Features:
 * - Idempotent schema creation on open
 * - Batched inserts, one transaction per batch
 * - Explicit outer transaction for archive-scoped writes
 *
 * Every instance owns its own connection; nothing is cached across stores.
 */
export class EmailStore {
  private readonly insertStatement: Database.Statement<[EmailRecord]>;
  private readonly insertMany: Database.Transaction<(records: EmailRecord[]) => BatchResult>;
  private closed = false;

  private constructor(
    private readonly db: Database.Database,
    readonly filePath: string
  ) {
    this.insertStatement = db.prepare<EmailRecord>(INSERT_SQL);
    // Nested inside an open transaction, better-sqlite3 runs this as a savepoint
    this.insertMany = db.transaction((records: EmailRecord[]) => {
      let firstId: number | null = null;
      for (const record of records) {
        const info = this.insertStatement.run(toRow(record));
        if (firstId === null) {
          firstId = Number(info.lastInsertRowid);
        }
      }
      return { inserted: records.length, firstId };
    });
  }

  /**
   * Open (or create) a store and ensure the schema exists
   */
  static open(filePath: string, options: EmailStoreOptions = {}): EmailStore {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });

    const db = new Database(filePath);
    try {
      db.pragma(`journal_mode = ${options.journalMode ?? 'DELETE'}`);
      db.pragma('synchronous = NORMAL');
      db.pragma('temp_store = MEMORY');
      db.exec(EMAILS_TABLE_SQL);
    } catch (error) {
      db.close();
      throw error;
    }

    logger.debug('EmailStore', 'Store opened', { filePath, journalMode: options.journalMode ?? 'DELETE' });
    return new EmailStore(db, filePath);
  }

  /**
   * Insert records in one transaction
   *
   * On failure the whole batch is rolled back; earlier batches stay committed.
   */
  writeBatch(records: EmailRecord[]): BatchResult {
    if (records.length === 0) {
      return { inserted: 0, firstId: null };
    }
    return this.insertMany(records);
  }

  /**
   * Open an explicit transaction spanning several batches
   */
  begin(): void {
    this.db.exec('BEGIN');
  }

  commit(): void {
    this.db.exec('COMMIT');
  }

  rollback(): void {
    if (this.db.inTransaction) {
      this.db.exec('ROLLBACK');
    }
  }

  get inTransaction(): boolean {
    return this.db.inTransaction;
  }

  countRecords(sourcePst?: string): number {
    const row =
      sourcePst === undefined
        ? this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM emails').get()
        : this.db
            .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM emails WHERE source_pst = ?')
            .get(sourcePst);
    return row?.count ?? 0;
  }

  /**
   * Delete one archive's rows inserted at or after a row id
   *
   * @returns Number of deleted rows
   */
  deleteFrom(sourcePst: string, fromId: number): number {
    const info = this.db
      .prepare<[string, number]>('DELETE FROM emails WHERE source_pst = ? AND id >= ?')
      .run(sourcePst, fromId);
    return info.changes;
  }

  /**
   * All rows in insertion order
   */
  listRecords(sourcePst?: string): EmailRecord[] {
    return sourcePst === undefined
      ? this.db.prepare<[], EmailRecord>('SELECT * FROM emails ORDER BY id').all()
      : this.db.prepare<[string], EmailRecord>('SELECT * FROM emails WHERE source_pst = ? ORDER BY id').all(sourcePst);
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.rollback();
    this.db.close();
    this.closed = true;
  }
}

/**
 * Named parameters need every column present, id excluded
 */
function toRow(record: EmailRecord): EmailRecord {
  return {
    subject: record.subject,
    sender_name: record.sender_name,
    sender_email: record.sender_email,
    recipient_name: record.recipient_name,
    recipient_email: record.recipient_email,
    attachment_filename: record.attachment_filename,
    attachment_type: record.attachment_type,
    email_date: record.email_date,
    source_pst: record.source_pst,
  };
}
