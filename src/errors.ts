export type RivetErrorCode = 'SUITE_LOAD' | 'DATASET_LOAD' | 'CONFIG' | 'EMPTY_SUITE';

/**
 * Raised for failures that abort a whole run: a suite or dataset that cannot be
 * loaded, or configuration that is rejected before any request goes out.
 * Per-step failures are never thrown; they end up in a TestResult.
 */
export class RivetError extends Error {
  code: RivetErrorCode;

  constructor(code: RivetErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RivetError';
    this.code = code;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
