import AjvModule from 'ajv';
import { DateTime } from 'luxon';
import { TimetableSource } from '../interfaces/TimetableSource.js';
import { Course, CurriculumFilter, LectureEvent, TimetableSlice } from '../types/course.js';
import { TimetableConfig } from '../types/config.js';
import { describeError } from '../utils/errors.js';

const Ajv = AjvModule.default;

/**
 * Lecture as published by the course web site's timetable endpoint.
 * Times are local wall-clock times without an offset.
 */
interface OpenDataLecture {
  title: string;
  start: string;
  end: string;
  cod_modulo?: string;
  docente?: string;
  teams?: string;
  aule?: Array<{
    des_risorsa: string;
    des_ubicazione?: string;
  }>;
}

const timetableSchema = {
  type: 'array',
  items: {
    type: 'object',
    properties: {
      title: { type: 'string' },
      start: { type: 'string' },
      end: { type: 'string' },
      cod_modulo: { type: 'string' },
      docente: { type: 'string' },
      teams: { type: 'string' },
      aule: {
        type: 'array',
        items: {
          type: 'object',
          properties: {
            des_risorsa: { type: 'string' },
            des_ubicazione: { type: 'string' }
          },
          required: ['des_risorsa']
        }
      }
    },
    required: ['title', 'start', 'end']
  }
};

const ajv = new Ajv({ allErrors: true });
const validateTimetable = ajv.compile<OpenDataLecture[]>(timetableSchema);

export const DEFAULT_TIMETABLE_CONFIG: TimetableConfig = {
  path: '/orario-lezioni/@@orario_reale_json',
  timezone: 'Europe/Rome',
  requestTimeout: 30000,
  maxRetries: 3,
  retryDelay: 1000
};

/**
 * Timetable source reading the JSON timetable each course web site publishes
 */
export class OpenDataTimetableSource implements TimetableSource {
  private readonly config: TimetableConfig;

  constructor(config: Partial<TimetableConfig> = {}) {
    this.config = { ...DEFAULT_TIMETABLE_CONFIG, ...config };
  }

  async getTimetable(course: Course, year: number, curriculum: CurriculumFilter): Promise<TimetableSlice> {
    const url = this.buildTimetableUrl(course, year, curriculum);

    try {
      const payload = await this.fetchJson(url);

      if (!validateTimetable(payload)) {
        const details = ajv.errorsText(validateTimetable.errors, { dataVar: 'timetable' });
        throw new Error(`Unexpected timetable format: ${details}`);
      }

      return this.toLectureEvents(payload);
    } catch (error) {
      throw new Error(`Failed to fetch timetable from ${url}: ${describeError(error)}`, { cause: error });
    }
  }

  /**
   * Build the timetable URL for a course year
   */
  buildTimetableUrl(course: Course, year: number, curriculum: CurriculumFilter): string {
    const url = new URL(`${course.url.replace(/\/+$/, '')}${this.config.path}`);
    url.searchParams.set('anno', String(year));
    if (curriculum) {
      url.searchParams.set('curricula', curriculum);
    }
    return url.toString();
  }

  /**
   * Fetch JSON with a per-attempt timeout and exponential backoff between attempts
   */
  private async fetchJson(url: string): Promise<unknown> {
    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= this.config.maxRetries; attempt++) {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), this.config.requestTimeout);

      try {
        const response = await fetch(url, {
          signal: controller.signal,
          headers: {
            'User-Agent': 'LectureCalendar/1.0',
            'Accept': 'application/json'
          }
        });

        if (!response.ok) {
          throw new Error(`HTTP ${response.status}: ${response.statusText || 'Request failed'}`);
        }

        return await response.json();
      } catch (error) {
        lastError = error instanceof Error ? error : new Error('Unknown fetch error');

        if (attempt < this.config.maxRetries) {
          const delay = Math.pow(2, attempt - 1) * this.config.retryDelay;
          console.warn(`Timetable request to ${url} failed (attempt ${attempt}), retrying in ${delay}ms`);
          await new Promise(resolve => setTimeout(resolve, delay));
        }
      } finally {
        clearTimeout(timeoutId);
      }
    }

    throw lastError ?? new Error('Failed to fetch timetable after retries');
  }

  private toLectureEvents(lectures: OpenDataLecture[]): LectureEvent[] {
    const seenIds = new Map<string, number>();

    return lectures.map(lecture => {
      const start = this.parseLocalTime(lecture.start);
      const end = this.parseLocalTime(lecture.end);

      // The same module can be taught twice at once in different rooms
      const baseId = `${lecture.cod_modulo ?? 'lecture'}-${start.getTime()}`;
      const occurrence = seenIds.get(baseId) ?? 0;
      seenIds.set(baseId, occurrence + 1);

      return {
        id: occurrence === 0 ? baseId : `${baseId}-${occurrence}`,
        title: lecture.title,
        start,
        end,
        location: this.formatLocation(lecture),
        description: this.formatDescription(lecture),
        url: lecture.teams || undefined
      };
    });
  }

  private parseLocalTime(value: string): Date {
    const parsed = DateTime.fromISO(value, { zone: this.config.timezone });
    if (!parsed.isValid) {
      throw new Error(`Invalid lecture time "${value}": ${parsed.invalidExplanation ?? parsed.invalidReason}`);
    }
    return parsed.toJSDate();
  }

  private formatLocation(lecture: OpenDataLecture): string | undefined {
    if (!lecture.aule || lecture.aule.length === 0) {
      return undefined;
    }

    return lecture.aule
      .map(room => room.des_ubicazione ? `${room.des_risorsa} - ${room.des_ubicazione}` : room.des_risorsa)
      .join(', ');
  }

  private formatDescription(lecture: OpenDataLecture): string | undefined {
    const lines: string[] = [];
    if (lecture.docente) {
      lines.push(`Lecturer: ${lecture.docente}`);
    }
    if (lecture.teams) {
      lines.push(`Online: ${lecture.teams}`);
    }
    return lines.length > 0 ? lines.join('\n') : undefined;
  }
}
