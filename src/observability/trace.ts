import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

const MAX_TRACE_ID_LENGTH = 128;

interface TraceScope {
  traceId: string;
}

const scopes = new AsyncLocalStorage<TraceScope>();

export function currentTraceId(): string | undefined {
  return scopes.getStore()?.traceId;
}

/**
 * Accepts a caller-supplied trace id if it is a non-empty string of at most 128
 * characters, otherwise mints a new one.
 */
export function traceIdFrom(candidate: unknown): string {
  if (typeof candidate === 'string' && candidate.length > 0 && candidate.length <= MAX_TRACE_ID_LENGTH) {
    return candidate;
  }
  return randomUUID();
}

/** Binds `traceId` to the rest of the current async execution (Fastify hooks). */
export function enterTrace(traceId: string): void {
  scopes.enterWith({ traceId });
}

export function withTrace<T>(fn: () => T, traceId: string = randomUUID()): T {
  return scopes.run({ traceId }, fn);
}
