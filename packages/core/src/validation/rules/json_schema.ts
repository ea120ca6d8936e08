import { isJsonObject } from '@evalkit/shared';
import type { RuleResult, ValidationContext, ValidationRule } from '../types';
import { jsonTypeOf, matchesJsonType, readJson, type JsonValueType } from './json';

export interface JsonSchemaRuleOptions {
  /** Keys that must be present on the object */
  requiredKeys?: readonly string[];
  /** Expected type per key; only checked when the key is present */
  keyTypes?: Readonly<Record<string, JsonValueType>>;
}

/**
 * Checks that the response is a JSON object with the required keys and key types.
 * Reuses the value parsed by an earlier `JsonRule` when there is one.
 */
export class JsonSchemaRule implements ValidationRule {
  readonly name = 'json_schema';
  readonly requiredKeys: readonly string[];
  readonly keyTypes: Readonly<Record<string, JsonValueType>>;

  constructor(options: JsonSchemaRuleOptions = {}) {
    this.requiredKeys = Object.freeze([...(options.requiredKeys ?? [])]);
    this.keyTypes = Object.freeze({ ...(options.keyTypes ?? {}) });
  }

  validate(text: string, context: ValidationContext): RuleResult {
    const parsed = readJson(text, context);
    if (!parsed.ok) {
      return { valid: false, error: parsed.error };
    }

    const value = parsed.value;
    if (!isJsonObject(value)) {
      return { valid: false, error: `Response JSON must be an object, got ${jsonTypeOf(value)}` };
    }

    const problems: string[] = [];

    const missing = this.requiredKeys.filter((key) => !Object.prototype.hasOwnProperty.call(value, key));
    if (missing.length > 0) {
      problems.push(`Missing required keys: ${missing.join(', ')}`);
    }

    for (const [key, expected] of Object.entries(this.keyTypes)) {
      if (!Object.prototype.hasOwnProperty.call(value, key)) continue;
      if (!matchesJsonType(value[key], expected)) {
        problems.push(`Key '${key}' has type ${jsonTypeOf(value[key])}, expected ${expected}`);
      }
    }

    if (problems.length > 0) {
      return { valid: false, error: problems.join('; ') };
    }
    return { valid: true, metadata: { keys: Object.keys(value) } };
  }
}
