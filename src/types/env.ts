/**
 * Environment variables read by loadConfig
 */
export interface Env {
  /**
   * Handle administration service base URL
   * Example: https://handles.example.org/handle-service
   */
  HANDLE_SERVICE_URL?: string;

  /**
   * Naming authority prefix, e.g. 20.500.12345
   */
  HANDLE_PREFIX?: string;

  /**
   * Credentials for the Handle service (HTTP Basic)
   */
  HANDLE_SERVICE_USER?: string;
  HANDLE_SERVICE_PASSWORD?: string;

  /**
   * Site root Handles resolve to
   * Example: https://repository.example.org
   */
  HANDLE_TARGET_BASE_URL?: string;

  /**
   * JSON file with content model / datastream associations
   * Default: ./associations.json
   */
  HANDLE_ASSOCIATIONS_FILE?: string;

  /**
   * Optional: per-request timeout in ms (default: 10000)
   */
  HANDLE_REQUEST_TIMEOUT_MS?: string;

  /**
   * Optional: retries after a network failure (default: 3)
   */
  HANDLE_MAX_RETRIES?: string;
}
