import { describe, it, expect } from 'vitest';
import { buildPagination, parseOrderBy, toListOptions } from '../listing';
import { AppError, ErrorKind } from '../../utils/errors';

const FIELDS = ['name', 'createdAt'] as const;

describe('listing', () => {
  describe('parseOrderBy', () => {
    it('should fall back to the default order with the id as tie-breaker', () => {
      expect(parseOrderBy(undefined, FIELDS, { name: 1 })).toEqual({ name: 1, _id: 1 });
    });

    it('should sort descending with a leading minus', () => {
      expect(parseOrderBy('-createdAt', FIELDS, { name: 1 })).toEqual({ createdAt: -1, _id: 1 });
      expect(parseOrderBy('name', FIELDS, { name: 1 })).toEqual({ name: 1, _id: 1 });
    });

    it('should reject fields that cannot be sorted on', () => {
      let caught: unknown;
      try {
        parseOrderBy('-password', FIELDS, { name: 1 });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(AppError);
      expect(caught).toMatchObject({
        kind: ErrorKind.Validation,
        fieldErrors: [{ field: 'orderBy', message: 'Cannot sort by "password". Choose one of: name, createdAt' }],
      });
    });
  });

  it('should turn page and limit into skip and limit', () => {
    expect(toListOptions({ name: 1 }, 3, 20)).toEqual({ sort: { name: 1 }, skip: 40, limit: 20 });
  });

  it('should count pages', () => {
    expect(buildPagination(2, 20, 41)).toEqual({ page: 2, limit: 20, total: 41, pages: 3 });
    expect(buildPagination(1, 50, 0)).toEqual({ page: 1, limit: 50, total: 0, pages: 0 });
  });
});
