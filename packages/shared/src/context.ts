/**
 * AsyncLocalStorage Context Management
 *
 * Carries the correlation ID and the unit of work currently being processed
 * (source file and page) across the async calls of a pipeline run, so log
 * lines can be tied back to the document that produced them.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  sourcePath?: string;
  pageNumber?: number;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Get the current request context
 */
export function getContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Get the correlation ID from the current context, or generate a new one
 */
export function getCorrelationId(): string {
  const context = getContext();
  return context?.correlationId || ulid();
}

/**
 * Run a function within a new AsyncLocalStorage context
 */
export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Run an async function within a new AsyncLocalStorage context
 */
export async function runWithContextAsync<T>(
  context: RequestContext,
  fn: () => Promise<T>
): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Run an async function in a child of the current context, narrowing it to
 * one unit of work. The correlation ID is inherited.
 */
export async function withUnitContext<T>(
  unit: Pick<RequestContext, 'sourcePath' | 'pageNumber'>,
  fn: () => Promise<T>
): Promise<T> {
  const parent = getContext();
  return asyncLocalStorage.run(
    { ...parent, correlationId: parent?.correlationId || ulid(), ...unit },
    fn
  );
}

export { asyncLocalStorage };
