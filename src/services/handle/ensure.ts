import type { ReconcilerDeps } from './core';
import type { ReconcileResult } from '../../types/messages';
import type { DerivativeHook, RepositoryObject } from '../../types/repository';
import { HANDLE_CREATED } from '../../types/handle';
import { HandleServiceError } from '../../utils/errors';
import { failed, succeeded } from '../../utils/messages';

/**
 * Mint the object's Handle if it doesn't exist yet, then attach it to the
 * datastream that just changed.
 *
 * Process:
 * 1. Create the Handle when the service doesn't know it (201 = created)
 * 2. Look up associations for all of the object's content models
 * 3. Attach through the first association for the changed datastream that
 *    the object actually has. First match wins: associations of the
 *    object's other content models are ignored for this event.
 *
 * No matching association is not an error; the call still succeeds.
 */
export async function ensureHandleAndAttach(
  deps: ReconcilerDeps,
  object: RepositoryObject,
  hook: DerivativeHook
): Promise<ReconcileResult> {
  const pid = object.id;

  // ==========================================================================
  // STEP 1: MINT - Create the Handle if missing
  // ==========================================================================
  if (!(await deps.handles.exists(pid))) {
    const response = await deps.handles.create(pid);

    if (response.code !== HANDLE_CREATED) {
      const error = new HandleServiceError(
        'create',
        pid,
        response.error ?? `HTTP ${response.code}`,
        response.code
      );
      return failed(error.toMessage());
    }
  }

  // ==========================================================================
  // STEP 2: ATTACH - First association for the changed datastream
  // ==========================================================================
  const associations = await deps.associations.associationsFor(object.models);
  const match = associations.find(
    (association) =>
      association.datastreamId === hook.destination_dsid &&
      object.has(association.datastreamId)
  );

  if (!match) {
    return succeeded();
  }

  const attached = await deps.attacher.applyHandleToDatastream(
    object,
    match.datastreamId,
    match.transform
  );

  return { success: attached.success, messages: [attached.message] };
}
