/**
 * Shared domain types for the archive indexing pipeline
 *
 * @module shared/types
 */

/**
 * An input archive discovered in the target directory
 */
export interface SourceArchive {
  /** Normalized absolute path (identity) */
  path: string;

  /** File name, stored as source_pst on every record */
  name: string;

  /** File name without extension, unique within one run */
  stem: string;
}

/**
 * A display-name/address pair from an address header
 */
export interface MailAddress {
  name: string | null;
  address: string | null;
}

/**
 * One attachment part of a parsed message
 */
export interface AttachmentPart {
  filename: string;
  contentType: string;
  content: Buffer;
}

/**
 * One message decoded from a mailbox stream
 */
export interface RawMessage {
  /** Zero-based position of the message in its mailbox file */
  index: number;
  subject: string | null;
  sender: MailAddress;
  recipients: MailAddress[];

  /** ISO 8601 UTC timestamp, null when missing or unparseable */
  date: string | null;
  attachments: AttachmentPart[];
}

/**
 * An attachment written to disk by the extractor
 */
export interface AttachmentFile {
  /** Original (sanitized) attachment name */
  filename: string;
  contentType: string;

  /** Path relative to the attachments root, POSIX separators */
  relativePath: string;

  /** Location once the archive's attachments are published */
  absolutePath: string;
  size: number;
}

/**
 * One row of the emails table
 */
export interface EmailRecord {
  id?: number;
  subject: string | null;
  sender_name: string | null;
  sender_email: string | null;
  recipient_name: string | null;
  recipient_email: string | null;
  attachment_filename: string | null;
  attachment_type: string | null;
  email_date: string | null;
  source_pst: string;
}

/**
 * Per-archive pipeline states
 */
export enum ArchiveState {
  DISCOVERED = 'Discovered',
  CONVERTING = 'Converting',
  PARSING = 'Parsing',
  EXTRACTING = 'Extracting',
  PERSISTING = 'Persisting',
  DONE = 'Done',
  FAILED = 'Failed',
}
