import type { ReconcilerDeps } from './core';
import type { ReconcileResult } from '../../types/messages';
import type { RepositoryObject } from '../../types/repository';
import { HANDLE_ALREADY_ABSENT, HANDLE_DELETED } from '../../types/handle';
import { DC_DSID, removeHandleIdentifier } from '../../utils/dublin-core';
import { HandleServiceError } from '../../utils/errors';
import { failed, notice, succeeded } from '../../utils/messages';
import { parseXml, serializeXml } from '../../utils/xml';

/**
 * Delete the object's Handle once no configured datastream remains
 *
 * Process:
 * 1. No Handle: nothing to do
 * 2. Any associated datastream still present: the Handle is in use
 * 3. Otherwise drop the Handle identifier from DC (when there is a DC
 *    datastream), then delete the Handle. 204 and 500 (already gone) both
 *    count as deleted.
 */
export async function retractIfOrphaned(
  deps: ReconcilerDeps,
  object: RepositoryObject
): Promise<ReconcileResult> {
  const pid = object.id;

  // ==========================================================================
  // STEP 1: VALIDATE - Handle exists and nothing uses it
  // ==========================================================================
  if (!(await deps.handles.exists(pid))) {
    return succeeded();
  }

  const associations = await deps.associations.associationsFor(object.models);
  const inUse = associations.some((association) =>
    object.has(association.datastreamId)
  );
  if (inUse) {
    return succeeded();
  }

  // ==========================================================================
  // STEP 2: CLEAN DC - Remove identifiers equal to the canonical URL
  // ==========================================================================
  const handleUrl = deps.handles.canonicalUrl(pid);
  const dc = object.datastream(DC_DSID);

  if (dc) {
    const doc = parseXml(await dc.getContent());
    if (removeHandleIdentifier(doc, handleUrl) > 0) {
      await dc.setContent(serializeXml(doc));
    }
  }

  // ==========================================================================
  // STEP 3: DELETE HANDLE
  // ==========================================================================
  const response = await deps.handles.delete(pid);

  if (response.code !== HANDLE_DELETED && response.code !== HANDLE_ALREADY_ABSENT) {
    const error = new HandleServiceError(
      'delete',
      pid,
      response.error ?? `HTTP ${response.code}`,
      response.code
    );
    return failed(error.toMessage());
  }

  return succeeded(
    notice('Deleted the Handle {handle} of {pid}.', { pid, handle: handleUrl })
  );
}
