export interface RedactionResult {
  cleanedText: string;
  flags: string[];
}

const EMAIL_PATTERN = /\b[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}\b/gi;
const PHONE_PATTERN = /(?:\+\d{1,3}[ -]?)?\(?\b\d{3}\)?[ -]?\d{3}[ -]?\d{4}\b/g;

/**
 * Removes contact details from learner input before it is stored in the
 * transcript or forwarded to the model.
 */
export const redactLearnerInput = (rawInput: string): RedactionResult => {
  const flags: string[] = [];

  let cleanedText = rawInput.replace(EMAIL_PATTERN, () => {
    flags.push('email_redacted');
    return '[redacted-email]';
  });

  cleanedText = cleanedText.replace(PHONE_PATTERN, () => {
    flags.push('phone_redacted');
    return '[redacted-phone]';
  });

  return {
    cleanedText: cleanedText.trim(),
    flags: [...new Set(flags)],
  };
};
