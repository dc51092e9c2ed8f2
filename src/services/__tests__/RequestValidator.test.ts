/**
 * Unit tests for RequestValidator
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { RequestValidator, parseInteger } from '../RequestValidator.js';
import { CourseCatalog } from '../CourseCatalog.js';
import { computerScience, physics } from '../../__tests__/helpers.js';

describe('parseInteger', () => {
  it.each([
    ['42', 42],
    ['+3', 3],
    ['007', 7],
    ['-1', -1],
    ['0', 0]
  ])('should parse %s', (input, expected) => {
    expect(parseInteger(input)).toBe(expected);
  });

  it.each(['', ' 4', '4 ', '4.5', '1e3', 'abc', '0x10', '99999999999999999999'])(
    'should reject %j',
    (input) => {
      expect(parseInteger(input)).toBeUndefined();
    }
  );
});

describe('RequestValidator', () => {
  let catalog: CourseCatalog;
  let validator: RequestValidator;

  beforeEach(() => {
    catalog = new CourseCatalog([computerScience, physics]);
    validator = new RequestValidator(catalog);
  });

  it('should accept every year within the course duration', () => {
    for (let year = 1; year <= computerScience.durationYears; year++) {
      const result = validator.validate({ courseId: '42', year: String(year) });

      expect(result).toEqual({
        valid: true,
        request: {
          course: computerScience,
          courseId: 42,
          year,
          curriculum: undefined
        }
      });
    }
  });

  it.each(['0', '-1', '4', '10'])('should reject year %s as invalid input', (year) => {
    const result = validator.validate({ courseId: '42', year });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error.kind).toBe('InvalidInput');
      expect(result.error.statusCode).toBe(400);
      expect(result.error.message).toBe('Invalid year');
    }
  });

  it('should reject a non-numeric year', () => {
    const result = validator.validate({ courseId: '42', year: 'first' });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error.kind).toBe('InvalidInput');
      expect(result.error.message).toBe('Invalid year');
    }
  });

  it('should reject a non-numeric course id', () => {
    const result = validator.validate({ courseId: 'cs', year: '1' });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error.kind).toBe('InvalidInput');
      expect(result.error.message).toBe('Invalid course id');
    }
  });

  it.each(['1', '5', '0', 'abc'])('should report an unknown course as not found for year %j', (year) => {
    const result = validator.validate({ courseId: '9999', year });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error.kind).toBe('NotFound');
      expect(result.error.statusCode).toBe(404);
      expect(result.error.message).toBe('Course not found');
    }
  });

  it('should pass a curriculum token through unchanged', () => {
    const result = validator.validate({ courseId: '7', year: '2', curriculum: ' Applied-Physics ' });

    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.request.curriculum).toBe(' Applied-Physics ');
    }
  });

  it.each([undefined, null, ''])('should treat curriculum %j as no filter', (curriculum) => {
    const result = validator.validate({ courseId: '7', year: '1', curriculum });

    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.request.curriculum).toBeUndefined();
    }
  });

  it('should look the course up exactly once', () => {
    const findById = vi.spyOn(catalog, 'findById');

    validator.validate({ courseId: '42', year: '2' });

    expect(findById).toHaveBeenCalledTimes(1);
    expect(findById).toHaveBeenCalledWith(42);
  });
});
