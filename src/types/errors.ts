export const WHEEL_ERRORS = {
  INVALID_INDEX: 'INVALID_INDEX',
  FOLDER_NOT_FOUND: 'FOLDER_NOT_FOUND',
  INVALID_DRAFT: 'INVALID_DRAFT',
  PERSISTENCE_FAILED: 'PERSISTENCE_FAILED',
} as const;

export type WheelErrorCode = (typeof WHEEL_ERRORS)[keyof typeof WHEEL_ERRORS];

export class WheelError extends Error {
  readonly code: WheelErrorCode;

  constructor(code: WheelErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WheelError';
    this.code = code;
  }
}

export function isWheelError(error: unknown, code?: WheelErrorCode): error is WheelError {
  return error instanceof WheelError && (code === undefined || error.code === code);
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}
