import type {
  Message,
  MessageSeverity,
  ReconcileResult,
} from '../types/messages';

/**
 * Message for the user who triggered the change
 */
export function notice(
  text: string,
  substitutions: Record<string, string> = {},
  severity: MessageSeverity = 'info'
): Message {
  return { text, substitutions, channel: 'user-notice', severity };
}

/**
 * Message for the operational log
 */
export function operational(
  text: string,
  substitutions: Record<string, string> = {},
  severity: MessageSeverity = 'error'
): Message {
  return { text, substitutions, channel: 'operational-log', severity };
}

export function succeeded(...messages: Message[]): ReconcileResult {
  return { success: true, messages };
}

export function failed(...messages: Message[]): ReconcileResult {
  return { success: false, messages };
}

/**
 * Render `{name}` placeholders from the message's substitutions.
 * Placeholders without a substitution are left as written.
 */
export function formatMessage(message: Message): string {
  return message.text.replace(/\{(\w+)\}/g, (placeholder, name: string) =>
    Object.prototype.hasOwnProperty.call(message.substitutions, name)
      ? message.substitutions[name]
      : placeholder
  );
}
