export enum ErrorKind {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  TIMEOUT = 'TIMEOUT',
  UPSTREAM_ERROR = 'UPSTREAM_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/** Body of every error response. */
export interface ErrorBody {
  ok: false;
  error: ErrorKind;
  message: string;
}

export function errorBody(error: ErrorKind, message: string): ErrorBody {
  return { ok: false, error, message };
}

const ERROR_KINDS: ReadonlySet<string> = new Set(Object.values(ErrorKind));

export function isErrorBody(value: unknown): value is ErrorBody {
  return (
    typeof value === 'object' &&
    value !== null &&
    'ok' in value &&
    value.ok === false &&
    'error' in value &&
    typeof value.error === 'string' &&
    ERROR_KINDS.has(value.error) &&
    'message' in value &&
    typeof value.message === 'string'
  );
}
