import { ConfigError } from '@evalkit/shared';
import type { RuleResult, ValidationRule } from '../types';

export interface LengthRuleOptions {
  minLength?: number;
  maxLength?: number;
}

function checkBound(label: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
    throw new ConfigError(`${label} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Bounds the length of the text in characters (code points, so an emoji counts once).
 * Either bound may be omitted.
 */
export class LengthRule implements ValidationRule {
  readonly name = 'length';
  readonly minLength?: number;
  readonly maxLength?: number;

  constructor(options: LengthRuleOptions = {}) {
    checkBound('minLength', options.minLength);
    checkBound('maxLength', options.maxLength);
    if (
      options.minLength !== undefined &&
      options.maxLength !== undefined &&
      options.minLength > options.maxLength
    ) {
      throw new ConfigError(
        `minLength (${options.minLength}) cannot be greater than maxLength (${options.maxLength})`,
      );
    }
    this.minLength = options.minLength;
    this.maxLength = options.maxLength;
  }

  validate(text: string): RuleResult {
    const length = Array.from(text).length;

    if (this.minLength !== undefined && length < this.minLength) {
      return {
        valid: false,
        error: `Response length ${length} is below minimum of ${this.minLength}`,
      };
    }
    if (this.maxLength !== undefined && length > this.maxLength) {
      return {
        valid: false,
        error: `Response length ${length} exceeds maximum of ${this.maxLength}`,
      };
    }
    return { valid: true, metadata: { length } };
  }
}
