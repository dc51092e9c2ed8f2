import { Course, CurriculumFilter, TimetableSlice } from '../types/course.js';

/**
 * Interface for sources that provide the lecture timetable of a course year
 */
export interface TimetableSource {
  /**
   * Fetch the ordered lecture events for one course year, optionally narrowed
   * to a curriculum. Rejects when the data is unavailable or inconsistent.
   */
  getTimetable(course: Course, year: number, curriculum: CurriculumFilter): Promise<TimetableSlice>;
}
