import { findUniqueViolation } from './pg-errors';

describe('findUniqueViolation', () => {
  it('reads a unique violation raised by pg', () => {
    expect(
      findUniqueViolation({
        code: '23505',
        constraint: 'users_email_unique',
        detail: 'Key (email)=(ada@example.com) already exists.',
      }),
    ).toEqual({
      code: '23505',
      constraint: 'users_email_unique',
      detail: 'Key (email)=(ada@example.com) already exists.',
    });
  });

  it('follows the cause chain of wrapping errors', () => {
    const wrapped = Object.assign(new Error('query failed'), {
      cause: Object.assign(new Error('driver error'), {
        cause: { code: '23505', constraint: 'accounts_user_provider_unique' },
      }),
    });

    expect(findUniqueViolation(wrapped)).toEqual({
      code: '23505',
      constraint: 'accounts_user_provider_unique',
      detail: undefined,
    });
  });

  it('ignores other errors', () => {
    expect(findUniqueViolation({ code: '23503', constraint: 'accounts_user_id_fk' })).toBeNull();
    expect(findUniqueViolation(new Error('timeout'))).toBeNull();
    expect(findUniqueViolation('23505')).toBeNull();
    expect(findUniqueViolation(null)).toBeNull();
  });
});
