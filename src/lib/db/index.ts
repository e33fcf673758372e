import { sql } from '@vercel/postgres';
import { config } from '../config';
import { StorageError, errorMessage } from '../errors';
import { dropSchema, ensureSchema } from './schema';

let _schemaReady = false;

/**
 * Opens the backing store. Any failure here is fatal for startup, so it is
 * reported as a StorageError with the underlying message.
 */
export async function openDatabase(options: { reset?: boolean } = {}) {
  if (!config.postgresUrl) {
    throw new StorageError('POSTGRES_URL is not set; cannot open the database');
  }

  try {
    if (options.reset) {
      await dropSchema();
      _schemaReady = false;
    }
    if (!_schemaReady) {
      await ensureSchema();
      _schemaReady = true;
    }
  } catch (error) {
    throw new StorageError(`Failed to open database: ${errorMessage(error)}`, { cause: error });
  }
  return sql;
}

export function toIsoString(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value.toISOString();
  const parsed = new Date(String(value));
  return Number.isNaN(parsed.getTime()) ? null : parsed.toISOString();
}

export { sql };
