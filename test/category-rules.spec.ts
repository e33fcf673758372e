import { describe, it, expect } from 'vitest';
import type { Category } from '@/types';
import { StorageError } from '@/lib/errors';
import { assertCanMove, sanitizeCategoryName, wouldCreateCycle } from '@/lib/feeds/category-rules';

function category(id: string, parent_id: string | null = null): Category {
  return { id, name: id.toUpperCase(), parent_id, collapsed: false };
}

// a > b > c, plus a standalone d
const TREE = [category('a'), category('b', 'a'), category('c', 'b'), category('d')];

describe('sanitizeCategoryName', () => {
  it('strips control characters and surrounding whitespace', () => {
    expect(sanitizeCategoryName('  Te\x1b[1mch\x07 ')).toBe('Te[1mch');
  });

  it('rejects a name with nothing left', () => {
    expect(() => sanitizeCategoryName(' \x01\x7f ')).toThrow(StorageError);
    expect(() => sanitizeCategoryName('')).toThrow('Category name cannot be empty');
  });
});

describe('wouldCreateCycle', () => {
  it('detects a move under itself or a descendant', () => {
    expect(wouldCreateCycle(TREE, 'a', 'a')).toBe(true);
    expect(wouldCreateCycle(TREE, 'a', 'c')).toBe(true);
    expect(wouldCreateCycle(TREE, 'b', 'c')).toBe(true);
  });

  it('allows moves elsewhere in the tree', () => {
    expect(wouldCreateCycle(TREE, 'c', 'a')).toBe(false);
    expect(wouldCreateCycle(TREE, 'a', 'd')).toBe(false);
    expect(wouldCreateCycle(TREE, 'c', null)).toBe(false);
  });

  it('stops walking when stored parents already loop', () => {
    const looped = [category('x', 'y'), category('y', 'x'), category('z')];
    expect(wouldCreateCycle(looped, 'z', 'x')).toBe(false);
  });
});

describe('assertCanMove', () => {
  it('rejects a parent that does not exist', () => {
    expect(() => assertCanMove(TREE, 'a', 'missing')).toThrow('Parent category missing does not exist');
  });

  it('rejects a cycle', () => {
    expect(() => assertCanMove(TREE, 'a', 'b')).toThrow(
      'A category cannot be moved into itself or one of its subcategories'
    );
  });

  it('accepts a move to the top level', () => {
    expect(() => assertCanMove(TREE, 'b', null)).not.toThrow();
  });
});
