/**
 * Error handler that keeps every error it receives
 */

import type { ErrorHandler } from '../types/index.js';

export interface RecordingErrorHandler {
  readonly handler: ErrorHandler;
  readonly errors: Error[];
}

export function createRecordingErrorHandler(): RecordingErrorHandler {
  const errors: Error[] = [];
  return {
    handler: (error: Error) => {
      errors.push(error);
    },
    errors,
  };
}
