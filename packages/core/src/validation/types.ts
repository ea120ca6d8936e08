/**
 * Per-run scratch space shared by the rules of one `validate` call.
 * Created fresh for every call, so rules stay stateless.
 */
export interface ValidationContext {
  /** Set by the JSON rule once the text parsed; later rules reuse it */
  parsedJson?: { value: unknown };
}

/** Outcome of one rule against one text. */
export interface RuleResult {
  valid: boolean;
  /** Why the rule failed; absent when valid */
  error?: string;
  /** Anything a passing rule wants to report (matched keywords, length, …) */
  metadata?: Record<string, unknown>;
}

/**
 * A named, stateless predicate over a candidate text.
 * Implementations are immutable once constructed; any per-run state goes
 * through the `ValidationContext`.
 */
export interface ValidationRule {
  /** Rule kind, used to attribute errors */
  readonly name: string;
  validate(text: string, context: ValidationContext): RuleResult;
}

export interface RuleOutcome {
  readonly rule: string;
  readonly valid: boolean;
  readonly error?: string;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

/** Aggregated result of running one text through a chain. */
export interface ValidationReport {
  /** AND of every rule's result */
  readonly isValid: boolean;
  /** One message per failing rule, in rule order */
  readonly errors: readonly string[];
  /** Every rule's outcome, in rule order */
  readonly results: readonly RuleOutcome[];
}
