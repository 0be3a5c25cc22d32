/**
 * Service result types
 *
 * Services report expected failures as values and throw only for storage
 * failures. Routes turn a failure into the error envelope with the status
 * from ERROR_STATUS.
 */

export type ServiceErrorCode =
  | "INVALID_DESTINATION"
  | "INVALID_CODE_FORMAT"
  | "CODE_TAKEN"
  | "CODE_SPACE_EXHAUSTED"
  | "NOT_FOUND"
  | "DISABLED"
  | "FORBIDDEN"
  | "EMAIL_TAKEN"
  | "INVALID_CREDENTIALS"
  | "INACTIVE_USER";

export interface ServiceSuccess<T> {
  success: true;
  data: T;
}

export interface ServiceFailure {
  success: false;
  error: string;
  errorCode: ServiceErrorCode;
}

export type ServiceResult<T> = ServiceSuccess<T> | ServiceFailure;

export const ERROR_STATUS: Record<ServiceErrorCode, number> = {
  INVALID_DESTINATION: 400,
  INVALID_CODE_FORMAT: 422,
  CODE_TAKEN: 409,
  CODE_SPACE_EXHAUSTED: 503,
  NOT_FOUND: 404,
  DISABLED: 410,
  FORBIDDEN: 403,
  EMAIL_TAKEN: 409,
  INVALID_CREDENTIALS: 401,
  INACTIVE_USER: 403,
};

export function ok<T>(data: T): ServiceSuccess<T> {
  return { success: true, data };
}

export function fail(errorCode: ServiceErrorCode, error: string): ServiceFailure {
  return { success: false, error, errorCode };
}
