export type QueueErrorCode =
  | 'no_worker_for_site'
  | 'invalid_url'
  | 'invalid_value'
  | 'job_not_found'
  | 'invalid_state'
  | 'invalid_transition';

const STATUS_BY_CODE: Record<QueueErrorCode, number> = {
  no_worker_for_site: 400,
  invalid_url: 400,
  invalid_value: 400,
  job_not_found: 404,
  invalid_state: 409,
  invalid_transition: 409,
};

export class QueueError extends Error {
  public readonly code: QueueErrorCode;
  public readonly statusCode: number;

  constructor(code: QueueErrorCode, message: string) {
    super(message);
    this.name = 'QueueError';
    this.code = code;
    this.statusCode = STATUS_BY_CODE[code];
  }
}

export function isQueueError(error: unknown, code?: QueueErrorCode): error is QueueError {
  return error instanceof QueueError && (code === undefined || error.code === code);
}

export function describeError(error: unknown): string {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message.trim();
  }

  if (typeof error === 'string' && error.trim().length > 0) {
    return error.trim();
  }

  return 'unknown error';
}
