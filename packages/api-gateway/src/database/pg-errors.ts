const UNIQUE_VIOLATION = '23505';

export interface PgUniqueViolation {
  code: typeof UNIQUE_VIOLATION;
  constraint?: string;
  detail?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Finds a pg unique-violation error, following `cause`
 * for drivers that wrap the original error.
 */
export function findUniqueViolation(error: unknown): PgUniqueViolation | null {
  if (!isRecord(error)) {
    return null;
  }
  if (error.code === UNIQUE_VIOLATION) {
    return {
      code: UNIQUE_VIOLATION,
      constraint: typeof error.constraint === 'string' ? error.constraint : undefined,
      detail: typeof error.detail === 'string' ? error.detail : undefined,
    };
  }
  return error.cause === undefined ? null : findUniqueViolation(error.cause);
}
