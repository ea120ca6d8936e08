import type { RuleResult, ValidationRule } from '../types';

export interface CustomPredicateResult {
  valid: boolean;
  message?: string;
}

/** A caller-supplied check; return a boolean or a result carrying the failure message. */
export type CustomPredicate = (text: string) => boolean | CustomPredicateResult;

export class CustomRule implements ValidationRule {
  readonly name: string;

  constructor(
    private readonly predicate: CustomPredicate,
    name = 'custom',
  ) {
    this.name = name;
  }

  validate(text: string): RuleResult {
    const outcome = this.predicate(text);
    const { valid, message } = typeof outcome === 'boolean' ? { valid: outcome, message: undefined } : outcome;

    if (!valid) {
      return { valid: false, error: message || 'Custom validation failed' };
    }
    return message ? { valid: true, metadata: { message } } : { valid: true };
  }
}
