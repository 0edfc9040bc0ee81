import { describe, expect, it } from 'vitest';

import { redactLearnerInput } from '../../../src/core/tools/safety';

describe('redactLearnerInput', () => {
  it('replaces e-mail addresses and phone numbers', () => {
    expect(redactLearnerInput('Mail me at learner@example.com or call 555-123-4567 ')).toEqual({
      cleanedText: 'Mail me at [redacted-email] or call [redacted-phone]',
      flags: ['email_redacted', 'phone_redacted'],
    });
  });

  it('reports each kind of redaction once', () => {
    expect(redactLearnerInput('a@example.com and b@example.org').flags).toEqual(['email_redacted']);
  });

  it('leaves ordinary answers alone', () => {
    expect(redactLearnerInput('  The base case is n == 0.  ')).toEqual({
      cleanedText: 'The base case is n == 0.',
      flags: [],
    });
  });
});
