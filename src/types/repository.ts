/**
 * A datastream on a repository object.
 * Content is read and written as UTF-8 text; every datastream this library
 * edits is XML.
 */
export interface Datastream {
  readonly id: string;
  getContent(): Promise<string>;
  setContent(content: string): Promise<void>;
}

/**
 * A digital object in the repository.
 * Owned by the repository: the reconciler reads and writes datastreams
 * through this interface but never creates or purges objects.
 */
export interface RepositoryObject {
  /** Persistent identifier, e.g. "islandora:42" */
  readonly id: string;
  /** Content model identifiers, in the order the repository reports them */
  readonly models: ReadonlySet<string>;
  has(dsid: string): boolean;
  datastream(dsid: string): Datastream | undefined;
}

/**
 * Trigger passed in by the derivative pipeline.
 * `destination_dsid` names the datastream that just changed.
 */
export interface DerivativeHook {
  destination_dsid: string;
}
