/**
 * Calendar request handling: validation, cache lookup, timetable retrieval,
 * synthesis and response assembly
 */

import { TimetableSource } from '../interfaces/TimetableSource.js';
import { CalendarCache, calendarCacheKey } from '../services/CalendarCache.js';
import { CalendarSynthesizer } from '../services/CalendarSynthesizer.js';
import { RequestValidator } from '../services/RequestValidator.js';
import { CalendarRequest, TimetableSlice, ValidatedCalendarRequest } from '../types/course.js';

export interface CalendarResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: Buffer | string;
}

export const CORS_HEADERS: Record<string, string> = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type, Content-Length, Accept-Encoding, Authorization',
  'Access-Control-Allow-Methods': 'GET, HEAD, OPTIONS'
};

export interface CalendarRequestHandlerDeps {
  validator: RequestValidator;
  cache: CalendarCache;
  timetableSource: TimetableSource;
  synthesizer: CalendarSynthesizer;
}

export class CalendarRequestHandler {
  private readonly validator: RequestValidator;
  private readonly cache: CalendarCache;
  private readonly timetableSource: TimetableSource;
  private readonly synthesizer: CalendarSynthesizer;

  constructor(deps: CalendarRequestHandlerDeps) {
    this.validator = deps.validator;
    this.cache = deps.cache;
    this.timetableSource = deps.timetableSource;
    this.synthesizer = deps.synthesizer;
  }

  async handle(raw: CalendarRequest): Promise<CalendarResponse> {
    const validation = this.validator.validate(raw);
    if (!validation.valid) {
      return textResponse(validation.error.statusCode, validation.error.message);
    }

    const request = validation.request;
    const cacheKey = calendarCacheKey(request.courseId, request.year, request.curriculum);

    const cached = this.cache.get(cacheKey);
    if (cached) {
      return calendarResponse(request, cached);
    }

    let timetable: TimetableSlice;
    try {
      timetable = await this.timetableSource.getTimetable(request.course, request.year, request.curriculum);
    } catch (error) {
      logFailure('Unable to retrieve timetable', request, error);
      return textResponse(500, 'Unable to retrieve timetable');
    }

    let calendar: Buffer;
    try {
      calendar = this.synthesizer.render(request.course, request.year, timetable);
    } catch (error) {
      logFailure('Unable to serialize calendar', request, error);
      return textResponse(500, 'Unable to serialize calendar');
    }

    this.cache.set(cacheKey, calendar);
    return calendarResponse(request, calendar);
  }
}

export function calendarFilename(request: ValidatedCalendarRequest): string {
  return `lectures-${request.courseId}-${request.year}.ics`;
}

function calendarResponse(request: ValidatedCalendarRequest, body: Buffer): CalendarResponse {
  return {
    statusCode: 200,
    headers: {
      'Content-Type': 'text/calendar; charset=utf-8',
      'Content-Disposition': `attachment; filename=${calendarFilename(request)}`,
      ...CORS_HEADERS
    },
    body
  };
}

export function textResponse(statusCode: number, message: string): CalendarResponse {
  return {
    statusCode,
    headers: { 'Content-Type': 'text/plain; charset=utf-8' },
    body: message
  };
}

function logFailure(message: string, request: ValidatedCalendarRequest, error: unknown): void {
  console.error(
    `${message} (course ${request.courseId}, year ${request.year}, curriculum ${request.curriculum ?? 'none'}):`,
    error
  );
}
