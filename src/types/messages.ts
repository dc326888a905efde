/**
 * Where the derivative pipeline should surface a message:
 * - user-notice: shown to whoever triggered the change
 * - operational-log: written to the service log for operators
 */
export type MessageChannel = 'user-notice' | 'operational-log';

export type MessageSeverity = 'error' | 'warning' | 'notice' | 'info';

/**
 * A message produced by a reconciliation step.
 * `text` carries `{name}` placeholders that are filled from `substitutions`
 * when the message is rendered (see formatMessage).
 */
export interface Message {
  text: string;
  substitutions: Record<string, string>;
  channel: MessageChannel;
  severity?: MessageSeverity;
}

/**
 * Result of every public reconciler operation.
 * Failures are reported here, never thrown.
 */
export interface ReconcileResult {
  success: boolean;
  messages: Message[];
}
