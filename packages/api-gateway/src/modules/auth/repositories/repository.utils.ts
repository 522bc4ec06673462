import { findUniqueViolation } from '../../../database/pg-errors';
import { UniqueConstraintError } from '../interfaces/identity-stores.interface';

/**
 * Converts a pg unique violation into a UniqueConstraintError; other errors pass through
 */
export function translateWriteError(error: unknown): unknown {
  const violation = findUniqueViolation(error);
  return violation ? new UniqueConstraintError(violation.constraint) : error;
}

export function firstRow<T>(rows: T[], table: string): T {
  const [row] = rows;
  if (row === undefined) {
    throw new Error(`Insert into ${table} returned no row`);
  }
  return row;
}
