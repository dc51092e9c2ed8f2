/**
 * Course and timetable types shared by the directory, the timetable source
 * and the calendar synthesizer
 */

export interface Course {
  id: number;
  name: string;
  durationYears: number;
  url: string;
}

/**
 * Curriculum token as received from the client. `undefined` means the
 * unfiltered timetable. Never normalized.
 */
export type CurriculumFilter = string | undefined;

export interface LectureEvent {
  id: string;
  title: string;
  start: Date;
  end: Date;
  location?: string;
  description?: string;
  url?: string;
}

export type TimetableSlice = readonly LectureEvent[];

export interface CalendarRequest {
  courseId: string;
  year: string;
  curriculum?: string | null;
}

export interface ValidatedCalendarRequest {
  course: Course;
  courseId: number;
  year: number;
  curriculum: CurriculumFilter;
}
