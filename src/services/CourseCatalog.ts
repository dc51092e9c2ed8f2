import { promises as fs } from 'fs';
import AjvModule, { type JSONSchemaType } from 'ajv';
import addFormatsModule from 'ajv-formats';
import { CourseDirectory } from '../interfaces/CourseDirectory.js';
import { Course } from '../types/course.js';
import { describeError } from '../utils/errors.js';

// Both packages are CommonJS; the class and the plugin sit on `default`
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

const courseSchema: JSONSchemaType<Course> = {
  type: 'object',
  properties: {
    id: { type: 'integer', minimum: 1 },
    name: { type: 'string', minLength: 1 },
    durationYears: { type: 'integer', minimum: 1 },
    url: { type: 'string', format: 'uri' }
  },
  required: ['id', 'name', 'durationYears', 'url']
};

const catalogSchema: JSONSchemaType<Course[]> = {
  type: 'array',
  items: courseSchema
};

const ajv = new Ajv({ allErrors: true });
addFormats(ajv);
const validateCatalog = ajv.compile(catalogSchema);

/**
 * Course directory backed by the open-data snapshot of the course list
 */
export class CourseCatalog implements CourseDirectory {
  private courses: Map<number, Course> = new Map();

  constructor(courses: readonly Course[]) {
    for (const course of courses) {
      if (this.courses.has(course.id)) {
        console.warn(`Duplicate course id ${course.id} in catalog, keeping the last entry`);
      }
      this.courses.set(course.id, Object.freeze({ ...course }));
    }
  }

  /**
   * Build a catalog from parsed JSON, rejecting anything that is not a list
   * of courses
   */
  static parse(data: unknown): CourseCatalog {
    if (!validateCatalog(data)) {
      const details = ajv.errorsText(validateCatalog.errors, { dataVar: 'courses' });
      throw new Error(`Invalid course catalog: ${details}`);
    }
    return new CourseCatalog(data);
  }

  /**
   * Load the catalog from a JSON snapshot file
   */
  static async fromFile(path: string): Promise<CourseCatalog> {
    let contents: string;
    try {
      contents = await fs.readFile(path, 'utf-8');
    } catch (error) {
      throw new Error(`Failed to read course catalog ${path}: ${describeError(error)}`);
    }

    let data: unknown;
    try {
      data = JSON.parse(contents);
    } catch (error) {
      throw new Error(`Failed to parse course catalog ${path}: ${describeError(error)}`);
    }

    return CourseCatalog.parse(data);
  }

  findById(id: number): Course | undefined {
    return this.courses.get(id);
  }

  get size(): number {
    return this.courses.size;
  }
}
