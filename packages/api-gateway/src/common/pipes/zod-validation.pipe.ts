import { PipeTransform, Injectable } from '@nestjs/common';
import { ZodError, ZodIssue, ZodType, ZodTypeDef } from 'zod';
import { ValidationException } from '../exceptions/api.exceptions';
import { ERROR_CODES, ErrorCode } from '../constants/error-codes';

/**
 * Validates a body or query against a zod schema and raises a
 * ValidationException describing the first failing field.
 */
@Injectable()
export class ZodValidationPipe<T> implements PipeTransform<unknown, T> {
  constructor(private readonly schema: ZodType<T, ZodTypeDef, unknown>) {}

  transform(value: unknown): T {
    const result = this.schema.safeParse(value);
    if (result.success) {
      return result.data;
    }
    throw this.toException(result.error);
  }

  private toException(error: ZodError): ValidationException {
    const [firstIssue] = error.issues;
    if (!firstIssue) {
      return new ValidationException(ERROR_CODES.INVALID_REQUEST_BODY, 'Invalid request');
    }

    const field = firstIssue.path.join('.');
    const suggestion = this.getSuggestion(firstIssue);

    return new ValidationException(this.getErrorCode(firstIssue), firstIssue.message, {
      field,
      constraint: this.getConstraintMessage(firstIssue),
      ...(suggestion ? { suggestion } : {}),
      validation: error.issues.map(issue => ({
        field: issue.path.join('.'),
        message: issue.message,
        code: issue.code,
      })),
    });
  }

  private getErrorCode(issue: ZodIssue): ErrorCode {
    switch (issue.code) {
      case 'invalid_string':
        if (issue.validation === 'email') {
          return ERROR_CODES.INVALID_EMAIL_FORMAT;
        }
        if (issue.validation === 'regex' && issue.path.includes('password')) {
          return ERROR_CODES.WEAK_PASSWORD;
        }
        return ERROR_CODES.INVALID_FIELD_VALUE;
      case 'too_small':
      case 'too_big':
        return issue.path.includes('password')
          ? ERROR_CODES.WEAK_PASSWORD
          : ERROR_CODES.INVALID_FIELD_VALUE;
      case 'invalid_type':
      case 'custom':
        return ERROR_CODES.INVALID_FIELD_VALUE;
      default:
        return ERROR_CODES.INVALID_REQUEST_BODY;
    }
  }

  private getConstraintMessage(issue: ZodIssue): string {
    switch (issue.code) {
      case 'too_small':
        if (issue.type === 'string') {
          return `must be at least ${issue.minimum} characters`;
        }
        if (issue.type === 'array') {
          return `must contain at least ${issue.minimum} items`;
        }
        return `minimum value: ${issue.minimum}`;

      case 'too_big':
        if (issue.type === 'string') {
          return `must not exceed ${issue.maximum} characters`;
        }
        if (issue.type === 'array') {
          return `must not contain more than ${issue.maximum} items`;
        }
        return `maximum value: ${issue.maximum}`;

      case 'invalid_string':
        if (issue.validation === 'email') {
          return 'must be a valid email address';
        }
        if (issue.validation === 'regex') {
          return 'must match the required format';
        }
        return 'must be a valid string';

      case 'invalid_type':
        return `must be of type ${issue.expected}`;

      default:
        return issue.message || 'invalid value';
    }
  }

  private getSuggestion(issue: ZodIssue): string | undefined {
    if (issue.code === 'invalid_string' && issue.validation === 'email') {
      return 'Example: user@example.com';
    }
    if (issue.path.includes('password') && issue.code !== 'invalid_type') {
      return 'Use 8-64 characters with an uppercase letter and one of !@#$%^&*';
    }
    return undefined;
  }
}
