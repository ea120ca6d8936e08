import fs from 'fs';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from '@evalkit/shared';
import type { ValidationRule } from './types';
import {
  ContainsRule,
  JSON_VALUE_TYPES,
  JsonRule,
  JsonSchemaRule,
  LengthRule,
  NotEmptyRule,
  RegexRule,
} from './rules';

const JsonValueTypeSchema = z.enum(JSON_VALUE_TYPES);

export const RuleSpecSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('not_empty') }).strict(),
  z
    .object({
      type: z.literal('length'),
      minLength: z.number().int().min(0).optional(),
      maxLength: z.number().int().min(0).optional(),
    })
    .strict(),
  z.object({ type: z.literal('json') }).strict(),
  z
    .object({
      type: z.literal('json_schema'),
      requiredKeys: z.array(z.string()).optional(),
      keyTypes: z.record(z.string(), JsonValueTypeSchema).optional(),
    })
    .strict(),
  z
    .object({
      type: z.literal('contains'),
      keywords: z.array(z.string()).min(1),
      caseSensitive: z.boolean().optional(),
      allRequired: z.boolean().optional(),
    })
    .strict(),
  z
    .object({
      type: z.literal('regex'),
      pattern: z.string(),
      flags: z.string().optional(),
    })
    .strict(),
]);

export const RuleSetSchema = z.object({
  rules: z.array(RuleSpecSchema),
});

export type RuleSpec = z.infer<typeof RuleSpecSchema>;

export function createRule(spec: RuleSpec): ValidationRule {
  switch (spec.type) {
    case 'not_empty':
      return new NotEmptyRule();
    case 'length':
      return new LengthRule({ minLength: spec.minLength, maxLength: spec.maxLength });
    case 'json':
      return new JsonRule();
    case 'json_schema':
      return new JsonSchemaRule({ requiredKeys: spec.requiredKeys, keyTypes: spec.keyTypes });
    case 'contains':
      return new ContainsRule({
        keywords: spec.keywords,
        caseSensitive: spec.caseSensitive,
        allRequired: spec.allRequired,
      });
    case 'regex':
      return new RegexRule({ pattern: spec.pattern, flags: spec.flags });
  }
}

/**
 * Validates a rule-set document (`{ rules: [...] }`) and builds its rules in order.
 * @throws ConfigError listing every schema issue
 */
export function parseRuleSet(input: unknown): ValidationRule[] {
  const result = RuleSetSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `- ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new ConfigError(`Rule set validation failed:\n${issues}`);
  }
  return result.data.rules.map(createRule);
}

/**
 * Reads a YAML or JSON rule-set file.
 * @throws ConfigError when the file is missing, unparsable or invalid
 */
export function loadRuleSet(filePath: string): ValidationRule[] {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Rule set file not found: ${filePath}`);
  }

  let document: unknown;
  try {
    document = yaml.load(fs.readFileSync(filePath, 'utf8'));
  } catch (error: unknown) {
    throw new ConfigError(`Error parsing rule set file: ${filePath}\n${errorMessage(error)}`, {
      cause: error,
    });
  }

  return parseRuleSet(document);
}
