// src/utils/errors.ts
import { BigIntegerError } from '../lib/num/errors.js';

export type ErrorInfo = {
  name: string;
  message: string;
  code?: string;
};

export function normalizeError(err: unknown): ErrorInfo {
  if (err instanceof BigIntegerError) {
    return { name: err.name, message: err.message, code: err.code };
  }
  if (err instanceof Error) {
    return {
      name: err.name || 'Error',
      message: err.message || 'unknown',
    };
  }
  return {
    name: typeof err,
    message: String(err),
  };
}

/**
 * One line for the terminal, e.g. "BigIntegerParseError [invalid_character]: ..."
 */
export function describeError(err: unknown): string {
  const info = normalizeError(err);
  const tag = info.code ? ` [${info.code}]` : '';
  return `${info.name}${tag}: ${info.message}`;
}
