export interface SafetyResult {
  cleanedText: string;
  flags: string[];
}

const EMAIL_PATTERN = /\b[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}\b/gi;
const PHONE_PATTERN = /(?:\+?\d{1,3}[ -]?)?(?:\(\d{3}\)|\d{3})[ -]?\d{3}[ -]?\d{4}\b/g;
const SECRET_PATTERN = /\b(password|passcode|pin|otp)(\s*(?:is|:|=)\s*)(\S+)/gi;

const redact = (
  text: string,
  pattern: RegExp,
  replacement: string,
): { text: string; matched: boolean } => {
  pattern.lastIndex = 0;
  const matched = pattern.test(text);
  pattern.lastIndex = 0;
  return matched ? { text: text.replace(pattern, replacement), matched } : { text, matched };
};

/**
 * Trainees sometimes type real credentials or contact details while playing
 * along with a lure. Those never reach the transcript or the model.
 */
export const applySafetyGuards = (rawInput: string): SafetyResult => {
  const flags: string[] = [];
  let cleanedText = rawInput;

  const secrets = redact(cleanedText, SECRET_PATTERN, '$1$2[redacted-secret]');
  cleanedText = secrets.text;
  if (secrets.matched) {
    flags.push('secret_redacted');
  }

  const emails = redact(cleanedText, EMAIL_PATTERN, '[redacted-email]');
  cleanedText = emails.text;
  if (emails.matched) {
    flags.push('email_redacted');
  }

  const phones = redact(cleanedText, PHONE_PATTERN, '[redacted-phone]');
  cleanedText = phones.text;
  if (phones.matched) {
    flags.push('phone_redacted');
  }

  return {
    cleanedText,
    flags,
  };
};
