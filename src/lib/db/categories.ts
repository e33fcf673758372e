import { sql } from '@vercel/postgres';
import type { Category, CategoryInput } from '@/types';
import { assertCanMove, sanitizeCategoryName } from '../feeds/category-rules';

function parseCategory(row: Record<string, unknown>): Category {
  return {
    id: String(row.id),
    name: String(row.name),
    parent_id: row.parent_id == null ? null : String(row.parent_id),
    collapsed: row.collapsed === true,
  };
}

export async function getCategories(): Promise<Category[]> {
  const { rows } = await sql`SELECT * FROM categories ORDER BY LOWER(name)`;
  return rows.map(parseCategory);
}

// Same name under the same parent resolves to the existing row
export async function upsertCategory(input: CategoryInput): Promise<string> {
  const { rows } = await sql`
    INSERT INTO categories (name, parent_id)
    VALUES (${input.name}, ${input.parent_id})
    ON CONFLICT (name, COALESCE(parent_id, '')) DO UPDATE SET name = EXCLUDED.name
    RETURNING id
  `;
  return String(rows[0].id);
}

export async function renameCategory(id: string, name: string): Promise<void> {
  const clean = sanitizeCategoryName(name);
  await sql`UPDATE categories SET name = ${clean} WHERE id = ${id}`;
}

// Checked against the stored tree so a loop can never be written
export async function moveCategory(id: string, parentId: string | null): Promise<void> {
  assertCanMove(await getCategories(), id, parentId);
  await sql`UPDATE categories SET parent_id = ${parentId} WHERE id = ${id}`;
}

export async function setCategoryCollapsed(id: string, collapsed: boolean): Promise<void> {
  await sql`UPDATE categories SET collapsed = ${collapsed} WHERE id = ${id}`;
}

/**
 * Member feeds become uncategorized and child categories move up to the
 * deleted category's parent, so the forest stays connected.
 */
export async function deleteCategory(id: string): Promise<void> {
  await sql`UPDATE feeds SET category_id = NULL WHERE category_id = ${id}`;
  await sql`
    UPDATE categories
    SET parent_id = (SELECT parent_id FROM categories WHERE id = ${id})
    WHERE parent_id = ${id}
  `;
  await sql`DELETE FROM categories WHERE id = ${id}`;
}
