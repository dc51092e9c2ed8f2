/**
 * iCalendar (RFC 5545) writer for calendar documents
 */

import { DateTime } from 'luxon';
import { CalendarDocument, CalendarEvent } from '../types/calendar.js';
import { CalendarSerializationError } from './errors.js';

const MAX_LINE_OCTETS = 75;
const CRLF = '\r\n';
const CONTROL_CHARS = /[\u0000-\u001F\u007F]/;
const CONTROL_CHARS_EXCEPT_TAB = /[\u0000-\u0008\u000A-\u001F\u007F]/g;

export const DEFAULT_PRODUCT_ID = '-//lecture-calendar//timetable feed//EN';

export interface SerializeOptions {
  productId?: string;
  /** Value written as DTSTAMP on every event */
  timestamp: Date;
}

/**
 * Serialize a calendar document to iCalendar text
 */
export function serializeCalendar(document: CalendarDocument, options: SerializeOptions): string {
  const dtstamp = formatUtc(options.timestamp, 'DTSTAMP');
  const lines: string[] = [
    'BEGIN:VCALENDAR',
    'VERSION:2.0',
    `PRODID:${options.productId ?? DEFAULT_PRODUCT_ID}`,
    'CALSCALE:GREGORIAN',
    'METHOD:PUBLISH',
    `NAME:${escapeText(document.name)}`,
    `X-WR-CALNAME:${escapeText(document.name)}`,
    `DESCRIPTION:${escapeText(document.description)}`,
    `X-WR-CALDESC:${escapeText(document.description)}`
  ];

  for (const event of document.events) {
    lines.push(...eventLines(event, dtstamp));
  }

  lines.push('END:VCALENDAR');

  return lines.map(foldLine).join(CRLF) + CRLF;
}

function eventLines(event: CalendarEvent, dtstamp: string): string[] {
  if (!event.uid) {
    throw new CalendarSerializationError(`Event "${event.title}" has no UID`);
  }

  const start = formatUtc(event.start, `DTSTART of event ${event.uid}`);
  const end = formatUtc(event.end, `DTEND of event ${event.uid}`);
  if (event.end.getTime() < event.start.getTime()) {
    throw new CalendarSerializationError(`Event ${event.uid} ends before it starts`);
  }

  const lines = [
    'BEGIN:VEVENT',
    `UID:${escapeText(event.uid)}`,
    `DTSTAMP:${dtstamp}`,
    `DTSTART:${start}`,
    `DTEND:${end}`,
    `SUMMARY:${escapeText(event.title)}`
  ];

  if (event.location) {
    lines.push(`LOCATION:${escapeText(event.location)}`);
  }

  if (event.description) {
    lines.push(`DESCRIPTION:${escapeText(event.description)}`);
  }

  if (event.url) {
    lines.push(`URL:${formatUri(event.url, event.uid)}`);
  }

  lines.push('END:VEVENT');
  return lines;
}

/**
 * Format a date as a UTC DATE-TIME value, e.g. 20240923T070000Z
 */
export function formatUtc(date: Date, field: string): string {
  if (Number.isNaN(date.getTime())) {
    throw new CalendarSerializationError(`Invalid date in ${field}`);
  }
  return DateTime.fromJSDate(date, { zone: 'utc' }).toFormat("yyyyMMdd'T'HHmmss'Z'");
}

/**
 * URI values are written unescaped, so they must parse and hold no control characters
 */
export function formatUri(value: string, uid: string): string {
  if (CONTROL_CHARS.test(value) || !URL.canParse(value)) {
    throw new CalendarSerializationError(`Event ${uid} has an invalid URL`);
  }
  return value;
}

/**
 * Escape text for iCalendar format. Line breaks become \n and other
 * control characters except tab are dropped.
 */
export function escapeText(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\r\n|\r|\n/g, '\\n')
    .replace(CONTROL_CHARS_EXCEPT_TAB, '');
}

/**
 * Fold a content line so that no physical line exceeds 75 octets.
 * Continuation lines start with a single space.
 */
export function foldLine(line: string): string {
  if (Buffer.byteLength(line, 'utf-8') <= MAX_LINE_OCTETS) {
    return line;
  }

  const parts: string[] = [];
  let current = '';
  let currentOctets = 0;
  let limit = MAX_LINE_OCTETS;

  // Iterating by code point keeps multi-byte characters on one line
  for (const char of line) {
    const size = Buffer.byteLength(char, 'utf-8');
    if (currentOctets + size > limit) {
      parts.push(current);
      current = '';
      currentOctets = 0;
      limit = MAX_LINE_OCTETS - 1;
    }
    current += char;
    currentOctets += size;
  }
  parts.push(current);

  return parts.join(`${CRLF} `);
}
