import type { Message } from '../types/messages';
import { formatMessage } from './messages';

/**
 * Write reconciliation messages to the console, tagged with their source.
 *
 * Operational errors go to stderr, warnings to console.warn, everything else
 * to console.log.
 *
 * @example
 * reportMessages(result.messages);
 * // [HANDLE] Unable to create a Handle for islandora:1: HTTP 500
 */
export function reportMessages(messages: Message[], from: string = 'HANDLE'): void {
  for (const message of messages) {
    const line = `[${from}] ${formatMessage(message)}`;

    if (message.channel === 'operational-log' && message.severity === 'error') {
      console.error(line);
    } else if (message.severity === 'warning' || message.severity === 'error') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}
