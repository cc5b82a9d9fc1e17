/**
 * Tests for the response parser
 */

import { describe, it, expect } from 'vitest';
import { extractCurrentDate, extractHomeworks } from '../../src/homework/responseParser.js';
import { InvalidShapeError, MissingFieldError } from '../../src/errors.js';

describe('extractHomeworks', () => {
  it('should return the homework list as-is', () => {
    const homeworks = [
      { id: 2, status: 'reviewing', homework_name: 'hw2' },
      { id: 1, status: 'approved', homework_name: 'hw1' },
    ];

    expect(extractHomeworks({ homeworks, current_date: 1700000600 })).toBe(homeworks);
  });

  it('should return an empty list', () => {
    expect(extractHomeworks({ homeworks: [] })).toEqual([]);
  });

  it('should raise MissingFieldError when the key is absent', () => {
    expect(() => extractHomeworks({ current_date: 1700000600 })).toThrow(MissingFieldError);
    expect(() => extractHomeworks({})).toThrow(
      'Required key "homeworks" is absent in API response.'
    );
  });

  it('should raise MissingFieldError when the body is not an object', () => {
    expect(() => extractHomeworks('maintenance')).toThrow(MissingFieldError);
    expect(() => extractHomeworks(null)).toThrow(MissingFieldError);
    expect(() => extractHomeworks([])).toThrow(MissingFieldError);
  });

  it('should raise InvalidShapeError when homeworks is not a list', () => {
    expect(() => extractHomeworks({ homeworks: 'not a list' })).toThrow(InvalidShapeError);
    expect(() => extractHomeworks({ homeworks: { id: 1 } })).toThrow(
      'Homeworks are not a list.'
    );
  });
});

describe('extractCurrentDate', () => {
  it('should use the server-reported date', () => {
    expect(extractCurrentDate({ homeworks: [], current_date: 1700000600 }, 1700000000)).toBe(
      1700000600
    );
  });

  it('should keep the fallback when the date is absent', () => {
    expect(extractCurrentDate({ homeworks: [] }, 1700000000)).toBe(1700000000);
  });

  it('should keep the fallback when the date is not an integer', () => {
    expect(extractCurrentDate({ current_date: '1700000600' }, 1700000000)).toBe(1700000000);
    expect(extractCurrentDate({ current_date: 1700000600.5 }, 1700000000)).toBe(1700000000);
    expect(extractCurrentDate('maintenance', 1700000000)).toBe(1700000000);
  });
});
