import type { HandleReconciler } from './reconciler';
import type { Message } from '../types/messages';
import type { RepositoryObject } from '../types/repository';
import { processBatchedSettled } from '../utils/batch';
import { parseHandleError } from '../utils/errors';
import { operational } from '../utils/messages';

export interface BulkReport {
  pid: string;
  success: boolean;
  messages: Message[];
}

/**
 * Mint, attach and sync Handles for objects that already exist
 *
 * For each object: ensureHandleAndAttach as if `dsid` had just changed,
 * then syncDublinCore when that succeeded. One object failing never stops
 * the rest.
 *
 * @param reconciler - Reconciler to run each object through
 * @param objects - Objects to process
 * @param dsid - Datastream to treat as changed
 * @param options.batchSize - Objects processed in parallel (default: 5)
 * @returns One report per object, in input order
 */
export async function applyHandles(
  reconciler: HandleReconciler,
  objects: RepositoryObject[],
  dsid: string,
  options: { batchSize?: number } = {}
): Promise<BulkReport[]> {
  const settled = await processBatchedSettled(
    objects,
    options.batchSize ?? 5,
    async (object) => {
      const ensured = await reconciler.ensureHandleAndAttach(object, {
        destination_dsid: dsid,
      });
      if (!ensured.success) {
        return ensured;
      }

      const synced = await reconciler.syncDublinCore(object);
      return {
        success: synced.success,
        messages: [...ensured.messages, ...synced.messages],
      };
    }
  );

  return settled.map((outcome, index) => {
    const pid = objects[index].id;

    if (outcome.status === 'fulfilled') {
      return { pid, ...outcome.value };
    }
    return {
      pid,
      success: false,
      messages: [
        operational('Unable to apply a Handle to {pid}: {error}', {
          pid,
          error: parseHandleError(outcome.reason),
        }),
      ],
    };
  });
}
