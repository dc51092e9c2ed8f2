/**
 * Calendar document produced by the synthesizer and consumed by the serializer
 */

export interface CalendarEvent {
  uid: string;
  title: string;
  start: Date;
  end: Date;
  location?: string;
  description?: string;
  url?: string;
}

export interface CalendarDocument {
  name: string;
  description: string;
  events: CalendarEvent[];
}
