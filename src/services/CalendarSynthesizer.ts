/**
 * Turns a course year's timetable into a calendar document and its
 * iCalendar bytes
 */

import { CalendarDocument, CalendarEvent } from '../types/calendar.js';
import { Course, LectureEvent, TimetableSlice } from '../types/course.js';
import { Clock, systemClock } from '../utils/clock.js';
import { CalendarRequestError, describeError } from '../utils/errors.js';
import { DEFAULT_PRODUCT_ID, serializeCalendar } from '../utils/icalendar.js';

export interface SynthesizerOptions {
  productId?: string;
  clock?: Clock;
}

export function calendarName(course: Course, year: number): string {
  return `${course.name} - ${year} year`;
}

export function calendarDescription(course: Course, year: number): string {
  return `Lecture schedule for year ${year} of the course ${course.name}`;
}

export class CalendarSynthesizer {
  private readonly productId: string;
  private readonly clock: Clock;

  constructor(options: SynthesizerOptions = {}) {
    this.productId = options.productId ?? DEFAULT_PRODUCT_ID;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Build the calendar document. Events keep the order and identity the
   * timetable source gave them.
   */
  synthesize(course: Course, year: number, timetable: TimetableSlice): CalendarDocument {
    return {
      name: calendarName(course, year),
      description: calendarDescription(course, year),
      events: timetable.map(toCalendarEvent)
    };
  }

  /**
   * Synthesize and serialize in one step
   */
  render(course: Course, year: number, timetable: TimetableSlice): Buffer {
    const document = this.synthesize(course, year, timetable);

    try {
      const text = serializeCalendar(document, {
        productId: this.productId,
        timestamp: new Date(this.clock.now())
      });
      return Buffer.from(text, 'utf-8');
    } catch (error) {
      throw new CalendarRequestError(
        'SynthesisFailed',
        `Failed to serialize calendar: ${describeError(error)}`,
        { cause: error }
      );
    }
  }
}

function toCalendarEvent(lecture: LectureEvent): CalendarEvent {
  return {
    uid: lecture.id,
    title: lecture.title,
    start: lecture.start,
    end: lecture.end,
    location: lecture.location,
    description: lecture.description,
    url: lecture.url
  };
}
