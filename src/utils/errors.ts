/**
 * Error taxonomy for calendar requests
 */

export type CalendarErrorKind = 'InvalidInput' | 'NotFound' | 'SynthesisFailed';

const STATUS_BY_KIND: Record<CalendarErrorKind, number> = {
  InvalidInput: 400,
  NotFound: 404,
  SynthesisFailed: 500
};

export class CalendarRequestError extends Error {
  readonly kind: CalendarErrorKind;
  readonly statusCode: number;

  constructor(kind: CalendarErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CalendarRequestError';
    this.kind = kind;
    this.statusCode = STATUS_BY_KIND[kind];
  }
}

/**
 * Raised by the serializer when an event cannot be written as iCalendar
 */
export class CalendarSerializationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CalendarSerializationError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
