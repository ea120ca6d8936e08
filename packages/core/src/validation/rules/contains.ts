import { ConfigError } from '@evalkit/shared';
import type { RuleResult, ValidationRule } from '../types';

export interface ContainsRuleOptions {
  keywords: readonly string[];
  /** Default: true */
  caseSensitive?: boolean;
  /** Require every keyword (true, the default) or at least one (false) */
  allRequired?: boolean;
}

/** Keyword containment under an all-of or any-of policy. */
export class ContainsRule implements ValidationRule {
  readonly name = 'contains';
  readonly keywords: readonly string[];
  readonly caseSensitive: boolean;
  readonly allRequired: boolean;

  constructor(options: ContainsRuleOptions) {
    if (options.keywords.length === 0) {
      throw new ConfigError('ContainsRule requires at least one keyword');
    }
    this.keywords = Object.freeze([...options.keywords]);
    this.caseSensitive = options.caseSensitive ?? true;
    this.allRequired = options.allRequired ?? true;
  }

  validate(text: string): RuleResult {
    const haystack = this.caseSensitive ? text : text.toLowerCase();
    const matched = this.keywords.filter((keyword) =>
      haystack.includes(this.caseSensitive ? keyword : keyword.toLowerCase()),
    );

    if (this.allRequired) {
      const missing = this.keywords.filter((keyword) => !matched.includes(keyword));
      if (missing.length > 0) {
        return { valid: false, error: `Response is missing required keywords: ${missing.join(', ')}` };
      }
    } else if (matched.length === 0) {
      return {
        valid: false,
        error: `Response does not contain any of the keywords: ${this.keywords.join(', ')}`,
      };
    }

    return { valid: true, metadata: { matched } };
  }
}
