import { v4 as uuidv4 } from 'uuid';
import type { ZodError } from 'zod';
import type { ApiResponse } from '../types';

export type RequestHeaders = Record<string, string | string[] | undefined>;

export const correlationIdFrom = (headers: RequestHeaders): string => {
  const cid = headers['x-correlation-id'];
  if (typeof cid === 'string' && cid.length > 0) return cid;
  return uuidv4();
};

export const ok = <T>(data: T, correlationId: string): ApiResponse<T> => ({ success: true, data, correlationId });

export const failure = (
  code: string,
  message: string,
  correlationId: string,
  details?: unknown
): ApiResponse<never> => ({
  success: false,
  error: { code, message, ...(details !== undefined ? { details } : {}) },
  correlationId,
});

/** `path: message` per issue, the way validation failures are reported. */
export const describeIssues = (error: ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
