import type { ReconcilerDeps } from './handle/core';
import type { ReconcileResult } from '../types/messages';
import type { DerivativeHook, RepositoryObject } from '../types/repository';
import { ensureHandleAndAttach } from './handle/ensure';
import { syncDublinCore } from './handle/sync';
import { retractIfOrphaned } from './handle/retract';
import { HandleServiceError, parseHandleError } from '../utils/errors';
import { KeyedLock } from '../utils/lock';
import { failed, operational } from '../utils/messages';

export interface HandleReconcilerOptions {
  /**
   * Run calls for the same pid one at a time (default: true).
   * Only coordinates callers in this process.
   */
  serializePerObject?: boolean;
}

/**
 * Keeps an object's Handle and its DC identifier in step with configuration
 *
 * Per object:
 *   NO_HANDLE → ensureHandleAndAttach → HANDLE_NO_DC_ENTRY
 *   HANDLE_NO_DC_ENTRY → syncDublinCore → HANDLE_WITH_DC_ENTRY
 *   any Handle state, no qualifying datastream left → retractIfOrphaned → NO_HANDLE
 *
 * Every operation resolves to a ReconcileResult; failures (including network
 * errors and malformed XML) come back as operational-log messages.
 */
export class HandleReconciler {
  private readonly lock = new KeyedLock();
  private readonly serializePerObject: boolean;

  constructor(
    private deps: ReconcilerDeps,
    options: HandleReconcilerOptions = {}
  ) {
    this.serializePerObject = options.serializePerObject ?? true;
  }

  ensureHandleAndAttach(
    object: RepositoryObject,
    hook: DerivativeHook
  ): Promise<ReconcileResult> {
    return this.guard('mint and attach the Handle', object, () =>
      ensureHandleAndAttach(this.deps, object, hook)
    );
  }

  syncDublinCore(object: RepositoryObject): Promise<ReconcileResult> {
    return this.guard('update the Dublin Core record', object, () =>
      syncDublinCore(this.deps, object)
    );
  }

  retractIfOrphaned(object: RepositoryObject): Promise<ReconcileResult> {
    return this.guard('retract the Handle', object, () =>
      retractIfOrphaned(this.deps, object)
    );
  }

  private async guard(
    operation: string,
    object: RepositoryObject,
    fn: () => Promise<ReconcileResult>
  ): Promise<ReconcileResult> {
    const pid = object.id;

    const run = async (): Promise<ReconcileResult> => {
      try {
        return await fn();
      } catch (error) {
        if (error instanceof HandleServiceError) {
          return failed(error.toMessage(pid));
        }
        return failed(
          operational('Unable to {operation} for {pid}: {error}', {
            operation,
            pid,
            error: parseHandleError(error),
          })
        );
      }
    };

    return this.serializePerObject ? this.lock.run(pid, run) : run();
  }
}
