import type { ReconcilerDeps } from './core';
import type { ReconcileResult } from '../../types/messages';
import type { RepositoryObject } from '../../types/repository';
import { DC_DSID, upsertHandleIdentifier } from '../../utils/dublin-core';
import { PreconditionError } from '../../utils/errors';
import { failed, notice, succeeded } from '../../utils/messages';
import { parseXml, serializeXml } from '../../utils/xml';

/**
 * Reflect the object's canonical Handle URL into its DC record
 *
 * Both preconditions (Handle exists, DC datastream present) are checked and
 * each failure is reported. The DC datastream is rewritten only when an
 * identifier was appended or a stale one replaced.
 */
export async function syncDublinCore(
  deps: ReconcilerDeps,
  object: RepositoryObject
): Promise<ReconcileResult> {
  const pid = object.id;

  // ==========================================================================
  // STEP 1: PRECONDITIONS - Reported independently
  // ==========================================================================
  const unmet: PreconditionError[] = [];

  if (!(await deps.handles.exists(pid))) {
    unmet.push(
      new PreconditionError(
        pid,
        'handle',
        'Unable to update the Dublin Core record of {pid}: no Handle exists for the object.'
      )
    );
  }

  const dc = object.datastream(DC_DSID);
  if (!dc) {
    unmet.push(
      new PreconditionError(
        pid,
        'datastream',
        'Unable to update the Dublin Core record of {pid}: the object has no DC datastream.'
      )
    );
  }

  if (unmet.length > 0 || !dc) {
    return failed(...unmet.map((error) => error.toMessage()));
  }

  // ==========================================================================
  // STEP 2: UPSERT - At most one Handle identifier
  // ==========================================================================
  const doc = parseXml(await dc.getContent());
  const handleUrl = deps.handles.canonicalUrl(pid);
  const update = upsertHandleIdentifier(doc, handleUrl);

  if (update === 'unchanged') {
    return succeeded();
  }

  // ==========================================================================
  // STEP 3: PERSIST
  // ==========================================================================
  await dc.setContent(serializeXml(doc));

  return succeeded(
    notice(
      update === 'replaced'
        ? 'Replaced the Handle in the Dublin Core record of {pid} with {handle}.'
        : 'Added the Handle {handle} to the Dublin Core record of {pid}.',
      { pid, handle: handleUrl }
    )
  );
}
