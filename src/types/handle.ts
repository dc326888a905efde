/**
 * Response of a mutating call against the Handle service.
 * `code` is the HTTP status the service answered with.
 */
export interface HandleResponse {
  code: number;
  error?: string;
}

/**
 * Status codes the reconciler accepts as success
 */
export const HANDLE_CREATED = 201;
export const HANDLE_DELETED = 204;
// The service answers 500 when the Handle is already gone
export const HANDLE_ALREADY_ABSENT = 500;

/**
 * Root of every canonical Handle URL
 */
export const HANDLE_RESOLVER = 'http://hdl.handle.net';

/**
 * Identifier-resolution service the reconciler mints Handles against.
 * Handles are keyed by the owning object's pid.
 */
export interface HandleService {
  exists(pid: string): Promise<boolean>;
  create(pid: string): Promise<HandleResponse>;
  delete(pid: string): Promise<HandleResponse>;
  /**
   * Canonical resolvable URL: http://hdl.handle.net/<prefix>/<pid>
   * Deterministic, never touches the network.
   */
  canonicalUrl(pid: string): string;
}
