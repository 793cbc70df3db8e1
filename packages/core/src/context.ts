/**
 * Run Context
 *
 * One extraction or audit run held in AsyncLocalStorage: its correlation
 * ID, the document it works on and the stage in progress. A stage started
 * inside another inherits the enclosing run's identity and start time.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export type RunStage = 'extract' | 'audit';

export interface RunContext {
  correlationId: string;
  stage: RunStage;
  documentId?: string;
  documentType?: string;
  pageCount?: number;
  /** Epoch milliseconds at which the outermost stage began */
  startedAt: number;
}

export type RunFields = Partial<Omit<RunContext, 'stage' | 'startedAt'>>;

const runStorage = new AsyncLocalStorage<RunContext>();

export function getContext(): RunContext | undefined {
  return runStorage.getStore();
}

/**
 * Correlation ID of the current run, or a fresh one outside any run
 */
export function getCorrelationId(): string {
  return getContext()?.correlationId ?? ulid();
}

/**
 * Milliseconds since the current run started; undefined outside a run.
 */
export function runElapsedMs(now: number = Date.now()): number | undefined {
  const context = getContext();
  return context ? now - context.startedAt : undefined;
}

/**
 * Context for a new stage. Unset fields come from the enclosing run.
 */
export function stageContext(stage: RunStage, fields: RunFields = {}): RunContext {
  const parent = getContext();
  return {
    correlationId: fields.correlationId ?? parent?.correlationId ?? ulid(),
    stage,
    documentId: fields.documentId ?? parent?.documentId,
    documentType: fields.documentType ?? parent?.documentType,
    pageCount: fields.pageCount ?? parent?.pageCount,
    startedAt: parent?.startedAt ?? Date.now(),
  };
}

/**
 * Run fn as the given stage. Works for sync and promise-returning functions.
 */
export function runStage<T>(stage: RunStage, fields: RunFields, fn: () => T): T {
  return runStorage.run(stageContext(stage, fields), fn);
}
