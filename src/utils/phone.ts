/**
 * Phone number normalization for contact identity and reply matching.
 */

const MATCH_KEY_LENGTH = 10;

/**
 * Canonical display form: digits only, keeping a leading `+` when present.
 * `" +1 (555) 123-4567 "` becomes `"+15551234567"`.
 */
export function toDisplayPhone(raw: string | undefined | null): string {
  if (!raw) {
    return '';
  }
  const trimmed = raw.trim();
  const digits = trimmed.replace(/\D/g, '');
  if (!digits) {
    return '';
  }
  return (trimmed.startsWith('+') ? '+' : '') + digits;
}

/**
 * Last 10 digits of the number, or all of them when there are fewer.
 * This key identifies the contact's campaign state.
 */
export function toMatchKey(raw: string | undefined | null): string {
  if (!raw) {
    return '';
  }
  return raw.replace(/\D/g, '').slice(-MATCH_KEY_LENGTH);
}

/**
 * Whether a key is looked up in the reply history. Only full 10-digit keys are.
 */
export function isReplyMatchable(matchKey: string): boolean {
  return matchKey.length === MATCH_KEY_LENGTH;
}

/**
 * Sanitize a phone number for logging (hide most digits for privacy).
 */
export function sanitizePhoneForLog(phone: string): string {
  if (!phone || phone.length < 4) {
    return '****';
  }
  return `***${phone.slice(-4)}`;
}
