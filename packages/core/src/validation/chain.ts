import { RuleEvaluationError } from '@evalkit/shared';
import type {
  RuleOutcome,
  ValidationContext,
  ValidationReport,
  ValidationRule,
} from './types';

/**
 * Runs a text through an ordered list of rules and folds the results into one report.
 *
 * Every rule runs, whatever happened before it, so one pass lists all violations.
 * A rule that throws is recorded as a failure of that rule and the chain moves on.
 *
 * @example
 * ```typescript
 * const chain = new ValidatorChain([
 *   new NotEmptyRule(),
 *   new JsonRule(),
 *   new JsonSchemaRule({ requiredKeys: ['status'], keyTypes: { status: 'string' } }),
 * ]);
 * const report = chain.validate('{"status": "ok"}');
 * ```
 */
export class ValidatorChain {
  readonly rules: readonly ValidationRule[];

  constructor(rules: readonly ValidationRule[]) {
    this.rules = Object.freeze([...rules]);
  }

  validate(text: string): ValidationReport {
    const context: ValidationContext = {};
    const results = this.rules.map((rule) => Object.freeze(runRule(rule, text, context)));
    const errors = results.flatMap((result) => (result.valid ? [] : [result.error ?? '']));

    return Object.freeze({
      isValid: errors.length === 0,
      errors: Object.freeze(errors),
      results: Object.freeze(results),
    });
  }
}

function runRule(rule: ValidationRule, text: string, context: ValidationContext): RuleOutcome {
  try {
    const result = rule.validate(text, context);
    if (result.valid) {
      return result.metadata
        ? { rule: rule.name, valid: true, metadata: Object.freeze({ ...result.metadata }) }
        : { rule: rule.name, valid: true };
    }
    return {
      rule: rule.name,
      valid: false,
      error: result.error || `Rule "${rule.name}" failed`,
    };
  } catch (e) {
    const failure = new RuleEvaluationError(rule.name, e instanceof Error ? e.message : String(e), {
      cause: e,
    });
    return { rule: rule.name, valid: false, error: failure.message };
  }
}
