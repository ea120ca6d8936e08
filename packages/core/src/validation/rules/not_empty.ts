import type { RuleResult, ValidationRule } from '../types';

/** Fails on empty or whitespace-only text. */
export class NotEmptyRule implements ValidationRule {
  readonly name = 'not_empty';

  validate(text: string): RuleResult {
    if (text.trim().length === 0) {
      return { valid: false, error: 'Response is empty' };
    }
    return { valid: true };
  }
}
