import { describe, it, expect } from 'vitest';
import { parseSortItem } from '../../src/collaborators/sort-item.js';
import { MalformedInputError } from '../../src/errors.js';

describe('parseSortItem', () => {
  it.each([
    ['name', 1, 'name'],
    ['+name', 1, 'name'],
    ['-name', -1, 'name'],
    ['asc(created_at)', 1, 'created_at'],
    ['desc(created_at)', -1, 'created_at'],
    ['age.asc', 1, 'age'],
    ['age.desc', -1, 'age'],
    [' -name ', -1, 'name'],
  ])('reads %j', (item, direction, field) => {
    expect(parseSortItem(item)).toEqual({ direction, field });
  });

  it.each(['', '-', 'desc()', 'name.up', '1abc', 'a b'])('rejects %j', (item) => {
    expect(() => parseSortItem(item)).toThrow(MalformedInputError);
  });
});
