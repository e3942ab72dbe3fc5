import type { PortState } from '../types/scanner.js';

// Structured socket error codes, checked before any message text
const CLOSED_CODES = new Set(['ECONNREFUSED']);
const FILTERED_CODES = new Set(['ETIMEDOUT', 'EACCES', 'EPERM', 'ENETUNREACH', 'EHOSTUNREACH']);

const FILTERED_HINTS = ['timeout', 'timed out', 'unreachable', 'filtered'];

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Best-effort reading of an error message. Platforms word these differently,
 * so this only runs when the error carries no recognised code.
 */
export function classifyByMessage(message: string): PortState {
  const lower = message.toLowerCase();
  if (lower.includes('refused')) {
    return 'closed';
  }
  if (FILTERED_HINTS.some((hint) => lower.includes(hint))) {
    return 'filtered';
  }
  return 'closed';
}

/** Map a failed connect attempt to a port state. */
export function classifyConnectError(error: unknown): PortState {
  const code = errorCode(error);
  if (code !== undefined) {
    if (CLOSED_CODES.has(code)) return 'closed';
    if (FILTERED_CODES.has(code)) return 'filtered';
  }
  return classifyByMessage(error instanceof Error ? error.message : String(error));
}
