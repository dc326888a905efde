import type { Message } from '../types/messages';
import { operational } from './messages';

/**
 * Base error class for reconciliation failures
 */
export class HandleError extends Error {
  constructor(
    message: string,
    public code: string = 'INTERNAL_ERROR',
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

/**
 * The Handle service answered with an unexpected status, or could not be reached
 */
export class HandleServiceError extends HandleError {
  constructor(
    public operation: 'exists' | 'create' | 'delete',
    public pid: string,
    message: string,
    public status?: number
  ) {
    super(message, 'HANDLE_SERVICE_ERROR', {
      operation,
      pid,
      ...(status !== undefined && { status }),
    });
  }

  toMessage(pid: string = this.pid): Message {
    const text =
      this.operation === 'create'
        ? 'Unable to create a Handle for {pid}: {error}'
        : this.operation === 'delete'
          ? 'Unable to delete the Handle for {pid}: {error}'
          : 'Unable to look up the Handle for {pid}: {error}';
    return operational(text, { pid, error: this.message });
  }
}

/**
 * A required Handle or datastream is missing
 * `template` keeps the {pid} placeholder for the operational message
 */
export class PreconditionError extends HandleError {
  constructor(
    public pid: string,
    public requirement: 'handle' | 'datastream',
    public template: string
  ) {
    super(template.split('{pid}').join(pid), 'PRECONDITION_FAILED', {
      pid,
      requirement,
    });
  }

  toMessage(pid: string = this.pid): Message {
    return operational(this.template, { pid });
  }
}

/**
 * Invalid environment or association configuration
 */
export class ConfigurationError extends HandleError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
  }
}

/**
 * Datastream content is not well-formed XML, or not the expected document
 */
export class XmlError extends HandleError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`XML error: ${message}`, 'XML_ERROR', details);
  }
}

/**
 * Extract a readable error message from anything thrown, or from a JSON
 * error body of the form { message } or { error }
 */
export function parseHandleError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null) {
    if ('message' in error && typeof error.message === 'string' && error.message) {
      return error.message;
    }
    if ('error' in error && typeof error.error === 'string' && error.error) {
      return error.error;
    }
  }
  return String(error);
}
