import { errorMessage } from '@evalkit/shared';
import type { RuleResult, ValidationRule } from '../types';

export interface RegexRuleOptions {
  pattern: string | RegExp;
  /** RegExp flags; replace the flags of a RegExp `pattern` when given */
  flags?: string;
}

/**
 * Passes when the pattern matches anywhere in the text (anchor it with `^…$`
 * for a full match). A pattern that does not compile fails every validation.
 */
export class RegexRule implements ValidationRule {
  readonly name = 'regex';
  readonly source: string;
  private readonly compiled: { regex: RegExp } | { error: string };

  constructor(options: RegexRuleOptions) {
    this.source = typeof options.pattern === 'string' ? options.pattern : options.pattern.source;
    try {
      this.compiled = { regex: new RegExp(options.pattern, options.flags) };
    } catch (e) {
      this.compiled = { error: errorMessage(e) };
    }
  }

  validate(text: string): RuleResult {
    if ('error' in this.compiled) {
      return { valid: false, error: `Invalid regex pattern '${this.source}': ${this.compiled.error}` };
    }

    // search() ignores lastIndex, so global and sticky patterns stay stateless.
    const index = text.search(this.compiled.regex);
    if (index === -1) {
      return { valid: false, error: `Response does not match pattern: ${this.source}` };
    }
    return { valid: true, metadata: { index } };
  }
}
