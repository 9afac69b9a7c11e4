import type { ChatPolicy, MailPolicy } from '../domain/index.js';

/**
 * Outcome of normalising a policy keyword.
 *
 * `warning` is set when the input had to be replaced by the default; the
 * caller decides how to surface it.
 */
export interface PolicyResult<T> {
  value: T;
  warning?: { action: string; message: string };
}

const CHAT_KEYWORDS = ['always', 'error', 'never'] as const;

const MAIL_KEYWORDS: Record<string, MailPolicy> = {
  yes: 'send',
  y: 'send',
  no: 'do-not-send',
  n: 'do-not-send',
};

export const SEND_EMAILS_KEY = 'send-emails';

function isChatPolicy(raw: string): raw is ChatPolicy {
  return (CHAT_KEYWORDS as readonly string[]).includes(raw);
}

/**
 * Validates the `notifications` keyword.
 * Anything outside always/error/never falls back to `always`.
 */
export function parseChatPolicy(raw: string): PolicyResult<ChatPolicy> {
  if (isChatPolicy(raw)) return { value: raw };
  return {
    value: 'always',
    warning: {
      action: 'JSON read',
      message: 'Notifications keyword format not supported. Default value is always.',
    },
  };
}

/**
 * Validates the `send-emails` keyword (yes/y/no/n, any case).
 * A missing or unrecognised value falls back to sending.
 */
export function parseMailPolicy(raw: string | undefined): PolicyResult<MailPolicy> {
  if (raw === undefined) {
    return {
      value: 'send',
      warning: {
        action: 'Getting email config',
        message: `Missing keyword '${SEND_EMAILS_KEY}' in email config. Default value is yes.`,
      },
    };
  }

  const value = MAIL_KEYWORDS[raw.toLowerCase()];
  if (value !== undefined) return { value };

  return {
    value: 'send',
    warning: {
      action: 'Getting email config',
      message: `Keyword '${SEND_EMAILS_KEY}' format not supported. Default value is yes.`,
    },
  };
}

/** `(always) or (error and errorCount > 0)`. */
export function shouldNotifyChat(policy: ChatPolicy, errorCount: number): boolean {
  return policy === 'always' || (policy === 'error' && errorCount > 0);
}
