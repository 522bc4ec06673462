import { ErrorCode } from '../constants/error-codes';

export interface ResponseMeta {
  requestId: string;
  version: string;
}

export interface SuccessEnvelope<T> {
  success: true;
  data: T;
  meta: ResponseMeta;
}

export interface ValidationIssue {
  field: string;
  message: string;
  code: string;
}

export interface ApiErrorDetails {
  field?: string;
  constraint?: string;
  suggestion?: string;
  // Every failing field, not just the first
  validation?: ValidationIssue[];
}

export interface ApiError {
  code: ErrorCode;
  message: string;
  details?: ApiErrorDetails;
  timestamp: string;
  traceId: string;
}

export interface ErrorEnvelope {
  success: false;
  error: ApiError;
}

export function successResponse<T>(data: T, meta: ResponseMeta): SuccessEnvelope<T> {
  return { success: true, data, meta };
}

export function errorResponse(
  error: Omit<ApiError, 'timestamp' | 'traceId'>,
  traceId: string,
): ErrorEnvelope {
  return {
    success: false,
    error: {
      ...error,
      timestamp: new Date().toISOString(),
      traceId,
    },
  };
}
