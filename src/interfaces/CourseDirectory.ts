import { Course } from '../types/course.js';

/**
 * Read-only lookup of courses by their numeric identifier
 */
export interface CourseDirectory {
  /**
   * Find a course, or `undefined` when the id is unknown
   */
  findById(id: number): Course | undefined;
}
