import { DriverModelError } from './drivers/errors';

/**
 * Who supplied the data that failed:
 * - 'client': the request or the scenario data it points at (4xx)
 * - 'internal': the built-in default driver configuration (5xx)
 */
export type ErrorSource = 'client' | 'internal';

export interface ErrorPayload {
  status: number;
  body: { success: false; error: string; code?: string };
}

export function toErrorPayload(error: unknown, source: ErrorSource = 'client'): ErrorPayload {
  if (error instanceof DriverModelError) {
    return {
      status: source === 'client' ? error.httpStatus : 500,
      body: { success: false, error: error.message, code: error.code },
    };
  }

  const message = error instanceof Error ? error.message : 'Internal Server Error';
  return { status: 500, body: { success: false, error: message || 'Internal Server Error' } };
}

export function parseIntegerParam(value: string | null | undefined): number | null {
  if (value == null || value.trim() === '') return null;
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : null;
}

/** `month` query parameter: 1 when absent, null when not a month */
export function parseMonthParam(value: string | null | undefined): number | null {
  if (value == null) return 1;
  const month = parseIntegerParam(value);
  return month !== null && month >= 1 && month <= 12 ? month : null;
}
