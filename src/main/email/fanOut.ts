/**
 * Row fan-out: one parsed message → one or more EmailRecords
 *
 * One row per recipient × attachment. A message with R recipients and
 * A attachments yields max(R, 1) × max(A, 1) rows; missing recipients or
 * attachments leave those columns NULL. Rows are recipient-major.
 *
 * @module main/email/fanOut
 */

import type { AttachmentFile, EmailRecord, MailAddress, RawMessage } from '../../shared/types/index.js';

/**
 * Number of rows a message produces
 */
export function recordCount(recipients: number, attachments: number): number {
  return Math.max(recipients, 1) * Math.max(attachments, 1);
}

export function buildEmailRecords(
  message: RawMessage,
  attachments: AttachmentFile[],
  sourcePst: string
): EmailRecord[] {
  const recipients: Array<MailAddress | null> = message.recipients.length > 0 ? message.recipients : [null];
  const files: Array<AttachmentFile | null> = attachments.length > 0 ? attachments : [null];
  const records: EmailRecord[] = [];

  for (const recipient of recipients) {
    for (const file of files) {
      records.push({
        subject: message.subject,
        sender_name: message.sender.name,
        sender_email: message.sender.address,
        recipient_name: recipient?.name ?? null,
        recipient_email: recipient?.address ?? null,
        attachment_filename: file?.relativePath ?? null,
        attachment_type: file?.contentType ?? null,
        email_date: message.date,
        source_pst: sourcePst,
      });
    }
  }

  return records;
}
