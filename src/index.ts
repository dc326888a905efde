import type { HandleConfig } from './config';
import type { HandleTransform } from './services/attach';
import type { HandleReconcilerOptions } from './services/reconciler';
import { readAssociationsFile } from './config';
import { HttpHandleService } from './clients/handle-server';
import { StaticConfigurationStore } from './services/associations';
import { XmlHandleAttacher } from './services/attach';
import { HandleReconciler } from './services/reconciler';

export { loadConfig, readAssociationsFile } from './config';
export type { HandleConfig } from './config';
export type { Env } from './types/env';
export type { Message, MessageChannel, MessageSeverity, ReconcileResult } from './types/messages';
export type { Datastream, DerivativeHook, RepositoryObject } from './types/repository';
export type { HandleResponse, HandleService } from './types/handle';
export { HANDLE_RESOLVER } from './types/handle';
export type { Association, AttachResult, ConfigurationStore, HandleAttacher } from './types/association';
export { AssociationSchema } from './types/association';

export { HttpHandleService } from './clients/handle-server';
export type { HandleServerOptions } from './clients/handle-server';
export { StaticConfigurationStore } from './services/associations';
export {
  BUILTIN_TRANSFORMS,
  XmlHandleAttacher,
  dcIdentifierTransform,
  modsIdentifierTransform,
} from './services/attach';
export type { HandleTransform } from './services/attach';
export { HandleReconciler } from './services/reconciler';
export type { HandleReconcilerOptions } from './services/reconciler';
export { applyHandles } from './services/bulk';
export type { BulkReport } from './services/bulk';
export { InMemoryDatastream, InMemoryRepositoryObject } from './repository/memory';

export {
  DC_NS,
  OAI_DC_NS,
  handleIdentifiers,
  removeHandleIdentifier,
  upsertHandleIdentifier,
} from './utils/dublin-core';
export {
  ConfigurationError,
  HandleError,
  HandleServiceError,
  PreconditionError,
  XmlError,
} from './utils/errors';
export { formatMessage } from './utils/messages';
export { reportMessages } from './utils/report';
export { parseXml, serializeXml } from './utils/xml';

/**
 * Wire a reconciler from configuration: HTTP Handle client, associations
 * read from the configured file, and the XML attacher.
 *
 * @example
 * const reconciler = await createHandleReconciler(loadConfig());
 * const result = await reconciler.syncDublinCore(object);
 * reportMessages(result.messages);
 */
export async function createHandleReconciler(
  config: HandleConfig,
  options: HandleReconcilerOptions & {
    transforms?: Record<string, HandleTransform>;
    fetch?: typeof fetch;
  } = {}
): Promise<HandleReconciler> {
  const handles = new HttpHandleService({
    serviceUrl: config.serviceUrl,
    prefix: config.prefix,
    username: config.username,
    password: config.password,
    targetBaseUrl: config.targetBaseUrl,
    timeoutMs: config.timeoutMs,
    maxRetries: config.maxRetries,
    fetch: options.fetch,
  });
  const associations = new StaticConfigurationStore(
    await readAssociationsFile(config.associationsFile)
  );
  const attacher = new XmlHandleAttacher(handles, options.transforms);

  return new HandleReconciler(
    { handles, associations, attacher },
    { serializePerObject: options.serializePerObject }
  );
}
