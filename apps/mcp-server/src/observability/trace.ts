import { randomUUID } from 'node:crypto';

/**
 * Reuses the protocol request id when the client sent one.
 */
export function ensureTraceId(requestId?: string | number): string {
  if (typeof requestId === 'number' && Number.isFinite(requestId)) {
    return String(requestId);
  }

  if (typeof requestId === 'string' && requestId.trim().length > 0) {
    return requestId;
  }

  return randomUUID();
}
