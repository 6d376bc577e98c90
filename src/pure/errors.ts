/**
 * Error kinds returned (never thrown) by the validation rules and operations.
 * Callers branch on `code`; `message` is for humans.
 */

export type CrmErrorCode =
  | 'DuplicateError'
  | 'FormatError'
  | 'RequiredFieldError'
  | 'RangeError'
  | 'NotFoundError'
  | 'ReferenceError';

export type CrmError = {
  readonly code: CrmErrorCode;
  readonly message: string;
};

export const duplicateError = (message: string): CrmError => ({ code: 'DuplicateError', message });
export const formatError = (message: string): CrmError => ({ code: 'FormatError', message });
export const requiredFieldError = (message: string): CrmError => ({ code: 'RequiredFieldError', message });
export const rangeError = (message: string): CrmError => ({ code: 'RangeError', message });
export const notFoundError = (message: string): CrmError => ({ code: 'NotFoundError', message });
export const referenceError = (message: string): CrmError => ({ code: 'ReferenceError', message });
