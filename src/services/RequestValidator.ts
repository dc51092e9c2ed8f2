/**
 * Validation of the course id, year and curriculum of a calendar request
 */

import { CourseDirectory } from '../interfaces/CourseDirectory.js';
import { CalendarRequest, ValidatedCalendarRequest } from '../types/course.js';
import { CalendarRequestError } from '../utils/errors.js';

export type RequestValidationResult =
  | { valid: true; request: ValidatedCalendarRequest }
  | { valid: false; error: CalendarRequestError };

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parse a base-10 integer, rejecting anything that is not only digits
 * with an optional sign
 */
export function parseInteger(value: string): number | undefined {
  if (!INTEGER_PATTERN.test(value)) {
    return undefined;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

export class RequestValidator {
  constructor(private readonly directory: CourseDirectory) {}

  validate(raw: CalendarRequest): RequestValidationResult {
    const courseId = parseInteger(raw.courseId);
    if (courseId === undefined) {
      return this.reject('InvalidInput', 'Invalid course id');
    }

    // Unknown courses are reported as such whatever the year looks like
    const course = this.directory.findById(courseId);
    if (!course) {
      return this.reject('NotFound', 'Course not found');
    }

    const year = parseInteger(raw.year);
    if (year === undefined || year < 1 || year > course.durationYears) {
      return this.reject('InvalidInput', 'Invalid year');
    }

    return {
      valid: true,
      request: {
        course,
        courseId,
        year,
        curriculum: raw.curriculum ? raw.curriculum : undefined
      }
    };
  }

  private reject(kind: 'InvalidInput' | 'NotFound', message: string): RequestValidationResult {
    return { valid: false, error: new CalendarRequestError(kind, message) };
  }
}
