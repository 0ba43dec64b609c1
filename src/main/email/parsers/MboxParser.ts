/**
 * MboxParser - Unix mbox format parser
 *
 * Streams an mbox file one message at a time. Messages are separated by
 * lines starting with "From " (the From_ delimiter); each message is
 * decoded with mailparser.
 *
 * Lines are read as latin1 so every byte survives the round trip into
 * mailparser, which does its own charset decoding.
 *
 * @module main/email/parsers/MboxParser
 */

import { promises as fs } from 'fs';
import * as readline from 'readline';
import { simpleParser, type AddressObject, type ParsedMail } from 'mailparser';
import { logger } from '../../config/logger.js';
import { MessageError, errorMessage } from '../../errors.js';
import { parseEmailDate } from '../../../shared/utils/dateUtils.js';
import type { AttachmentPart, MailAddress, RawMessage } from '../../../shared/types/index.js';

/**
 * One step of a parse: a decoded message or a skipped malformed one
 */
export type ParseEvent =
  | { kind: 'message'; message: RawMessage }
  | { kind: 'malformed'; index: number; error: MessageError };

export interface MboxParseResult {
  messages: RawMessage[];
  malformed: MessageError[];
}

/** RFC 5322 field name followed by a colon */
const HEADER_LINE = /^[\x21-\x39\x3b-\x7e]+:/;

/** From_ delimiter: envelope sender, then a ctime-style date ending in the year */
const FROM_LINE = /^From \S.*\d{4}(?:\s+[+-]\d{4})?\s*$/;

/** mboxrd-quoted From_ line inside a body */
const QUOTED_FROM_LINE = /^>+From /;

/**
 * MboxParser turns one mbox file into a lazy sequence of messages
 *
 * Every call to parse() opens its own stream, so parsers hold no state
 * between files and a file can be parsed again from the start.
 */
export class MboxParser {
  /**
   * Stream messages from an mbox file
   *
   * A malformed message is yielded as a 'malformed' event and parsing
   * continues with the next message.
   *
   * @param mboxPath - Path to the .mbox file
   * @throws Error if the file cannot be opened or read
   */
  async *parse(mboxPath: string): AsyncGenerator<ParseEvent> {
    logger.debug('MboxParser', `Starting parse for file: ${mboxPath}`);

    const handle = await fs.open(mboxPath, 'r');
    const input = handle.createReadStream({ encoding: 'latin1' });
    const lines = readline.createInterface({ input, crlfDelay: Infinity });

    let current: string[] | null = null;
    let previousBlank = true;
    let inHeaders = false;
    let index = 0;

    try {
      for await (const line of lines) {
        // A message cut off inside its headers ends at the next From_ line
        const isDelimiter = FROM_LINE.test(line) && (previousBlank || inHeaders || current === null);

        if (isDelimiter) {
          if (current !== null) {
            yield await this.decode(current, index++, mboxPath);
          }
          current = [];
          inHeaders = true;
        } else if (current !== null) {
          current.push(QUOTED_FROM_LINE.test(line) ? line.slice(1) : line);
          if (line.length === 0) {
            inHeaders = false;
          }
        }

        previousBlank = line.length === 0;
      }

      if (current !== null) {
        yield await this.decode(current, index++, mboxPath);
      }
    } finally {
      lines.close();
      input.destroy();
    }

    logger.debug('MboxParser', `Finished parse for file: ${mboxPath}`, { messages: index });
  }

  private async decode(lines: string[], index: number, mboxPath: string): Promise<ParseEvent> {
    try {
      return { kind: 'message', message: await parseMessage(lines, index) };
    } catch (error) {
      const messageError =
        error instanceof MessageError
          ? error
          : new MessageError(`Message ${index} could not be decoded: ${errorMessage(error)}`, index, {
              cause: error,
            });

      logger.warn('MboxParser', 'Skipping malformed message', {
        file: mboxPath,
        index,
        reason: messageError.message,
      });
      return { kind: 'malformed', index, error: messageError };
    }
  }
}

/**
 * Parse a whole mbox file into memory
 *
 * For tests and small files; the pipeline consumes parse() directly.
 */
export async function parseMboxFile(mboxPath: string): Promise<MboxParseResult> {
  const result: MboxParseResult = { messages: [], malformed: [] };

  for await (const event of new MboxParser().parse(mboxPath)) {
    if (event.kind === 'message') {
      result.messages.push(event.message);
    } else {
      result.malformed.push(event.error);
    }
  }

  return result;
}

/**
 * Decode the lines of one message (From_ line already removed)
 *
 * @throws MessageError when the header block is missing or truncated,
 * or the message has no sender address
 */
async function parseMessage(lines: string[], index: number): Promise<RawMessage> {
  if (lines.length === 0 || !HEADER_LINE.test(lines[0])) {
    throw new MessageError(`Message ${index} does not start with a header`, index);
  }

  if (!lines.includes('')) {
    throw new MessageError(`Message ${index} is truncated inside its header block`, index);
  }

  let end = lines.length;
  while (end > 0 && lines[end - 1] === '') {
    end--;
  }

  const source = Buffer.from(`${lines.slice(0, end).join('\n')}\n`, 'latin1');
  const parsed = await simpleParser(source, {
    skipHtmlToText: true,
    skipTextToHtml: true,
    skipTextLinks: true,
    skipImageLinks: true,
  });

  const sender = senderAddress(parsed.from);
  if (!sender) {
    throw new MessageError(`Message ${index} has no sender address`, index);
  }

  return {
    index,
    subject: extractSubject(parsed),
    sender,
    recipients: flattenAddresses(parsed.to),
    date: parseEmailDate(rawHeader(parsed, 'date')),
    attachments: extractAttachments(parsed),
  };
}

/**
 * Decoded subject, or the raw header value when decoding left
 * replacement characters behind
 */
function extractSubject(parsed: ParsedMail): string | null {
  const raw = rawHeader(parsed, 'subject');
  const decoded = parsed.subject;

  if (decoded === undefined) {
    return raw;
  }
  if (decoded.includes('\uFFFD') && raw !== null) {
    return raw;
  }
  return decoded;
}

/**
 * Unfolded raw value of the first header with this (lowercase) name
 */
function rawHeader(parsed: ParsedMail, key: string): string | null {
  const header = parsed.headerLines.find((entry) => entry.key === key);
  if (!header) {
    return null;
  }

  const colon = header.line.indexOf(':');
  return header.line
    .slice(colon + 1)
    .replace(/\r?\n[ \t]+/g, ' ')
    .trim();
}

function toMailAddress(name: string | undefined, address: string | undefined): MailAddress {
  return {
    name: name ? name : null,
    address: address ? address : null,
  };
}

function flattenAddresses(header: AddressObject | AddressObject[] | undefined): MailAddress[] {
  if (!header) {
    return [];
  }

  const objects = Array.isArray(header) ? header : [header];
  const addresses: MailAddress[] = [];

  for (const object of objects) {
    for (const entry of object.value) {
      if (entry.group) {
        for (const member of entry.group) {
          addresses.push(toMailAddress(member.name, member.address));
        }
      } else {
        addresses.push(toMailAddress(entry.name, entry.address));
      }
    }
  }

  return addresses.filter((entry) => entry.name !== null || entry.address !== null);
}

/**
 * First From entry that carries an address; a display name alone is no sender
 */
function senderAddress(header: AddressObject | undefined): MailAddress | null {
  return flattenAddresses(header).find((entry) => entry.address !== null) ?? null;
}

function extractAttachments(parsed: ParsedMail): AttachmentPart[] {
  return parsed.attachments.map((attachment, position) => ({
    filename: attachment.filename || `attachment-${position + 1}`,
    contentType: attachment.contentType || 'application/octet-stream',
    content: attachment.content,
  }));
}
