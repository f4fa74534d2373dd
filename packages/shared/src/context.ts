/**
 * Log Context
 *
 * Carries the correlation ID, batch ID and current document label through
 * async calls so every log line of a job or batch can be tied together.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  batchId?: string;
  documentLabel?: string;
}

const contextStore = new AsyncLocalStorage<RequestContext>();

export function getContext(): RequestContext | undefined {
  return contextStore.getStore();
}

/**
 * Correlation ID of the current context; outside any context each call
 * gets a fresh one.
 */
export function getCorrelationId(): string {
  return getContext()?.correlationId || ulid();
}

export async function runWithContextAsync<T>(
  context: RequestContext,
  fn: () => Promise<T>
): Promise<T> {
  return contextStore.run(context, fn);
}

/**
 * Run `fn` scoped to one document. Correlation and batch IDs are inherited
 * from the enclosing context, or a new correlation ID is started.
 */
export async function runForDocument<T>(documentLabel: string, fn: () => Promise<T>): Promise<T> {
  const parent = getContext();
  return contextStore.run(
    {
      correlationId: parent?.correlationId || ulid(),
      batchId: parent?.batchId,
      documentLabel,
    },
    fn
  );
}
