import { afterEach, describe, expect, it, vi } from 'vitest';
import { formatMessage, notice, operational } from '../src/utils/messages';
import { reportMessages } from '../src/utils/report';
import {
  HandleServiceError,
  PreconditionError,
  XmlError,
  parseHandleError,
} from '../src/utils/errors';

describe('formatMessage', () => {
  it('fills placeholders from substitutions', () => {
    expect(
      formatMessage(notice('Deleted the Handle {handle} of {pid}.', {
        pid: 'islandora:7',
        handle: 'http://hdl.handle.net/20.500.12345/islandora:7',
      }))
    ).toBe('Deleted the Handle http://hdl.handle.net/20.500.12345/islandora:7 of islandora:7.');
  });

  it('leaves unknown placeholders as written', () => {
    expect(formatMessage(operational('Unable to update {pid}: {error}', { pid: 'islandora:7' }))).toBe(
      'Unable to update islandora:7: {error}'
    );
  });
});

describe('reportMessages', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('routes messages by channel and severity', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    reportMessages([
      notice('Added {handle}.', { handle: 'hdl' }),
      notice('Check {pid}.', { pid: 'islandora:7' }, 'warning'),
      operational('Lost {pid}.', { pid: 'islandora:7' }),
      operational('Retried {pid}.', { pid: 'islandora:7' }, 'info'),
    ]);

    expect(log.mock.calls).toEqual([['[HANDLE] Added hdl.'], ['[HANDLE] Retried islandora:7.']]);
    expect(warn.mock.calls).toEqual([['[HANDLE] Check islandora:7.']]);
    expect(error.mock.calls).toEqual([['[HANDLE] Lost islandora:7.']]);
  });
});

describe('errors', () => {
  it('serializes with code and details', () => {
    const error = new HandleServiceError('delete', 'islandora:7', 'Forbidden', 403);

    expect(error.name).toBe('HandleServiceError');
    expect(error.toJSON()).toEqual({
      error: 'HANDLE_SERVICE_ERROR',
      message: 'Forbidden',
      details: { operation: 'delete', pid: 'islandora:7', status: 403 },
    });
  });

  it('renders precondition failures with the pid filled in', () => {
    const error = new PreconditionError('islandora:7', 'handle', 'No Handle for {pid}.');

    expect(error.message).toBe('No Handle for islandora:7.');
    expect(error.toMessage()).toEqual({
      text: 'No Handle for {pid}.',
      substitutions: { pid: 'islandora:7' },
      channel: 'operational-log',
      severity: 'error',
    });
  });

  it('prefixes XML errors', () => {
    expect(new XmlError('document has no root element').message).toBe(
      'XML error: document has no root element'
    );
  });

  it('extracts messages from anything thrown', () => {
    expect(parseHandleError(new Error('boom'))).toBe('boom');
    expect(parseHandleError({ message: 'Handle exists' })).toBe('Handle exists');
    expect(parseHandleError({ error: 'Unauthorized' })).toBe('Unauthorized');
    expect(parseHandleError('plain')).toBe('plain');
  });
});
