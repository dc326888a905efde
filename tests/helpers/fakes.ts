import type { HandleResponse, HandleService } from '../../src/types/handle';

export const PREFIX = '20.500.12345';

type HandleOperation = 'exists' | 'create' | 'delete';

/**
 * In-memory Handle service
 * Mirrors the status codes of the real service: 201 on create, 204 on
 * delete, 500 when deleting a Handle that is already gone.
 */
export class FakeHandleService implements HandleService {
  readonly handles = new Set<string>();
  readonly calls: Array<{ operation: HandleOperation; pid: string }> = [];

  createResponse: (pid: string) => HandleResponse = () => ({ code: 201 });
  deleteResponse?: (pid: string) => HandleResponse;
  existsError?: Error;

  constructor(public prefix: string = PREFIX) {}

  async exists(pid: string): Promise<boolean> {
    this.calls.push({ operation: 'exists', pid });
    if (this.existsError) {
      throw this.existsError;
    }
    return this.handles.has(pid);
  }

  async create(pid: string): Promise<HandleResponse> {
    this.calls.push({ operation: 'create', pid });
    const response = this.createResponse(pid);
    if (response.code === 201) {
      this.handles.add(pid);
    }
    return response;
  }

  async delete(pid: string): Promise<HandleResponse> {
    this.calls.push({ operation: 'delete', pid });
    const response = this.deleteResponse
      ? this.deleteResponse(pid)
      : { code: this.handles.has(pid) ? 204 : 500 };
    if (response.code === 204 || response.code === 500) {
      this.handles.delete(pid);
    }
    return response;
  }

  canonicalUrl(pid: string): string {
    return `http://hdl.handle.net/${this.prefix}/${pid}`;
  }

  count(operation: HandleOperation): number {
    return this.calls.filter((call) => call.operation === operation).length;
  }
}

/**
 * fetch stand-in answering from a queue of responses (or errors to throw)
 */
export function fakeFetch(...queue: Array<Response | Error>) {
  const calls: Array<{ url: string; init?: RequestInit }> = [];

  const impl: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), init });
    const next = queue.shift();
    if (!next) {
      throw new Error(`Unexpected request to ${String(input)}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  };

  return { impl, calls };
}

/**
 * OAI Dublin Core record with a title and the given identifiers
 */
export function dcRecord(...identifiers: string[]): string {
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<oai_dc:dc xmlns:oai_dc="http://www.openarchives.org/OAI/2.0/oai_dc/" xmlns:dc="http://purl.org/dc/elements/1.1/">',
    '  <dc:title>Harbour at dusk</dc:title>',
    ...identifiers.map((identifier) => `  <dc:identifier>${identifier}</dc:identifier>`),
    '</oai_dc:dc>',
    '',
  ].join('\n');
}
