/**
 * Shared fakes for calendar tests
 */

import { vi } from 'vitest';
import { Course, CurriculumFilter, LectureEvent, TimetableSlice } from '../types/course.js';
import { Clock } from '../utils/clock.js';

export class ManualClock implements Clock {
  private current: number;

  constructor(start: string = '2024-09-20T08:00:00Z') {
    this.current = Date.parse(start);
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export const computerScience: Course = {
  id: 42,
  name: 'Computer Science',
  durationYears: 3,
  url: 'https://corsi.example.edu/laurea/computer-science'
};

export const physics: Course = {
  id: 7,
  name: 'Physics',
  durationYears: 2,
  url: 'https://corsi.example.edu/laurea/physics'
};

export function lecture(overrides: Partial<LectureEvent> = {}): LectureEvent {
  return {
    id: 'ALG-1',
    title: 'Algorithms',
    start: new Date('2024-09-23T07:00:00Z'),
    end: new Date('2024-09-23T09:00:00Z'),
    location: 'Room 1 - Via Roma 1',
    ...overrides
  };
}

export const twoLectures: LectureEvent[] = [
  lecture(),
  lecture({
    id: 'CALC-1',
    title: 'Calculus',
    start: new Date('2024-09-23T09:00:00Z'),
    end: new Date('2024-09-23T11:00:00Z'),
    location: 'Room 2'
  })
];

/**
 * Timetable source double whose calls can be counted and whose results can
 * be changed per test
 */
export function createTimetableSource(events: TimetableSlice = twoLectures) {
  return {
    getTimetable: vi.fn(
      async (_course: Course, _year: number, _curriculum: CurriculumFilter): Promise<TimetableSlice> => events
    )
  };
}
