import type { Category } from '@/types';
import { StorageError } from '../errors';

// C0 controls (ESC included) other than tab, newline and CR, plus DEL
const CONTROL_CHARS = /[\x00-\x08\x0b\x0c\x0e-\x1f\x7f]/g;

export function stripControlChars(text: string): string {
  return text.replace(CONTROL_CHARS, '');
}

export function sanitizeCategoryName(name: string): string {
  const clean = stripControlChars(name).trim();
  if (clean.length === 0) {
    throw new StorageError('Category name cannot be empty');
  }
  return clean;
}

/**
 * True when giving `categoryId` the parent `parentId` would close a loop,
 * i.e. the new parent is the category itself or one of its descendants.
 */
export function wouldCreateCycle(categories: Category[], categoryId: string, parentId: string | null): boolean {
  const parents = new Map(categories.map(c => [c.id, c.parent_id]));
  const seen = new Set<string>();
  let current = parentId;
  while (current !== null && !seen.has(current)) {
    if (current === categoryId) return true;
    seen.add(current);
    current = parents.get(current) ?? null;
  }
  return false;
}

export function assertCanMove(categories: Category[], categoryId: string, parentId: string | null): void {
  if (parentId !== null && !categories.some(c => c.id === parentId)) {
    throw new StorageError(`Parent category ${parentId} does not exist`);
  }
  if (wouldCreateCycle(categories, categoryId, parentId)) {
    throw new StorageError('A category cannot be moved into itself or one of its subcategories');
  }
}
