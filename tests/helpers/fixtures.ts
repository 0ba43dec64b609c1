/**
 * Shared test fixtures: temporary directories and mbox builders
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import type { EmailRecord } from '../../src/shared/types/index.js';

/**
 * Create a fresh temporary directory (realpath, so comparisons against
 * resolved paths hold)
 */
export async function makeTempDir(prefix = 'pst-indexer-'): Promise<string> {
  return fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), prefix)));
}

export async function removeDir(dir: string | undefined): Promise<void> {
  if (dir) {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

export interface MessageFixture {
  from?: string;
  to?: string;
  subject?: string;
  date?: string;
  body?: string;
  extraHeaders?: string[];
}

/**
 * One mbox entry: From_ line, headers, blank line, body, trailing blank line
 */
export function mboxMessage(message: MessageFixture): string {
  const headers = [
    ...(message.from !== undefined ? [`From: ${message.from}`] : []),
    ...(message.to !== undefined ? [`To: ${message.to}`] : []),
    ...(message.subject !== undefined ? [`Subject: ${message.subject}`] : []),
    ...(message.date !== undefined ? [`Date: ${message.date}`] : []),
    ...(message.extraHeaders ?? []),
  ];
  return `From sender@example.com Mon Jan  5 10:00:00 2026\n${headers.join('\n')}\n\n${message.body ?? 'Hello'}\n\n`;
}

/**
 * A message whose header block never ends (file cut off mid-headers)
 */
export function truncatedMessage(): string {
  return 'From cut@example.com Mon Jan  5 11:00:00 2026\nFrom: Cut Off <cut@example.com>\nSubject: Interrupted';
}

/**
 * A multipart message carrying one attachment per entry
 */
export function mboxMessageWithAttachments(
  message: MessageFixture,
  attachments: Array<{ filename: string; contentType: string; base64: string }>
): string {
  const boundary = 'TEST-BOUNDARY';
  const parts = [
    `--${boundary}\nContent-Type: text/plain\n\n${message.body ?? 'See attached.'}`,
    ...attachments.map(
      (attachment) =>
        `--${boundary}\n` +
        `Content-Type: ${attachment.contentType}; name="${attachment.filename}"\n` +
        `Content-Disposition: attachment; filename="${attachment.filename}"\n` +
        'Content-Transfer-Encoding: base64\n\n' +
        attachment.base64
    ),
    `--${boundary}--`,
  ];

  return mboxMessage({
    ...message,
    extraHeaders: [
      ...(message.extraHeaders ?? []),
      'MIME-Version: 1.0',
      `Content-Type: multipart/mixed; boundary="${boundary}"`,
    ],
    body: parts.join('\n'),
  });
}

/** "%PDF-1.4\n" */
export const PDF_BASE64 = 'JVBERi0xLjQK';

export function emailRecord(overrides: Partial<EmailRecord> = {}): EmailRecord {
  return {
    subject: 'Status update',
    sender_name: 'Alice Example',
    sender_email: 'alice@example.com',
    recipient_name: 'Bob Example',
    recipient_email: 'bob@example.com',
    attachment_filename: null,
    attachment_type: null,
    email_date: '2026-01-05T10:00:00.000Z',
    source_pst: 'mailbox.pst',
    ...overrides,
  };
}
