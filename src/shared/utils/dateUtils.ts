/**
 * Date Utilities - Standardized date handling using date-fns v4.x
 *
 * Email dates are stored as ISO 8601 UTC strings so that stores written
 * on different machines compare equal.
 *
 * @module shared/utils/dateUtils
 */

import { isValid, parse, parseISO } from 'date-fns';

/** RFC 5322 date-time, day of week already removed */
const RFC5322_FORMATS = ['d MMM yyyy HH:mm:ss xx', 'd MMM yyyy HH:mm xx'];

/** Obsolete zone names still found in old archives */
const ZONE_OFFSETS: Record<string, string> = {
  UT: '+0000',
  UTC: '+0000',
  GMT: '+0000',
  Z: '+0000',
  EST: '-0500',
  EDT: '-0400',
  CST: '-0600',
  CDT: '-0500',
  MST: '-0700',
  MDT: '-0600',
  PST: '-0800',
  PDT: '-0700',
};

/**
 * Parse an email Date header to an ISO 8601 UTC string
 *
 * Tries ISO 8601 first, then RFC 5322 (with or without day of week and
 * seconds). Anything else is unparseable.
 *
 * @param dateHeader - Raw value of the Date header
 * @returns ISO 8601 UTC string, or null when missing or unparseable
 *
 * @example
 * ```typescript
 * parseEmailDate('Tue, 27 Jan 2026 10:30:00 +0800') // '2026-01-27T02:30:00.000Z'
 * parseEmailDate('not a date') // null
 * ```
 */
export function parseEmailDate(dateHeader: string | null | undefined): string | null {
  const value = stripComments(dateHeader ?? '').trim();
  if (!value) {
    return null;
  }

  const iso = parseISO(value);
  if (isValid(iso)) {
    return iso.toISOString();
  }

  const date = parseRfc5322(value);
  return date ? date.toISOString() : null;
}

function parseRfc5322(value: string): Date | null {
  const normalized = value
    .replace(/^[A-Za-z]{3},\s*/, '')
    .replace(/\s+/g, ' ')
    .replace(/ ([A-Za-z]{1,3})$/, (match: string, zone: string) => {
      const offset = ZONE_OFFSETS[zone.toUpperCase()];
      return offset ? ` ${offset}` : match;
    });

  for (const format of RFC5322_FORMATS) {
    const date = parse(normalized, format, new Date(0));
    if (isValid(date)) {
      return date;
    }
  }
  return null;
}

/**
 * Drop RFC 5322 comments such as "(UTC)" or "(Pacific Standard Time)"
 */
function stripComments(value: string): string {
  return value.replace(/\([^()]*\)/g, ' ');
}

/**
 * Format an elapsed duration for reports
 *
 * @example
 * ```typescript
 * formatDuration(65_250) // '1m 5.3s'
 * formatDuration(800) // '0.8s'
 * ```
 */
export function formatDuration(elapsedMs: number): string {
  // Round to tenths first so 59.96s carries into the minute
  const tenths = Math.round(Math.max(0, elapsedMs) / 100);
  const minutes = Math.floor(tenths / 600);
  const seconds = ((tenths - minutes * 600) / 10).toFixed(1);
  return minutes > 0 ? `${minutes}m ${seconds}s` : `${seconds}s`;
}
