/**
 * AsyncLocalStorage Context Management
 *
 * Carries the run id (and the document being processed, in batch mode)
 * through acquisition, extraction and persistence so every log line of a
 * run can be correlated.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RunContext {
  correlationId: string;
  documentPath?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RunContext>();

/**
 * Get the current run context
 */
export function getContext(): RunContext | undefined {
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
 * Start a new run context with a fresh ULID
 */
export function newRunContext(): RunContext {
  return { correlationId: ulid() };
}

/**
 * Run an async function within a new AsyncLocalStorage context
 */
export async function runWithContextAsync<T>(
  context: RunContext,
  fn: () => Promise<T>
): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Run an async function with the document path added to the current context
 */
export async function runForDocument<T>(documentPath: string, fn: () => Promise<T>): Promise<T> {
  const parent = getContext() ?? newRunContext();
  return asyncLocalStorage.run({ ...parent, documentPath }, fn);
}
