/**
 * Base interface for all evalkit events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Identifier of the evaluation run that produced the event */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/** How far judge output parsing got before reconciliation. */
export type ParseStage = 'strict' | 'fallback' | 'failed';

/** Emitted before a judge model is asked to score a response */
export interface JudgeRequested extends BaseEvent {
  type: 'JudgeRequested';
  payload: {
    judgeType: string;
    passingScore: number;
    responseChars: number;
  };
}

/** Emitted once a judge response has been parsed and reconciled */
export interface JudgeCompleted extends BaseEvent {
  type: 'JudgeCompleted';
  payload: {
    judgeType: string;
    score: number;
    passed: boolean;
    parseStage: ParseStage;
    durationMs: number;
  };
}

/** Emitted when the judge model call fails */
export interface JudgeFailed extends BaseEvent {
  type: 'JudgeFailed';
  payload: {
    judgeType: string;
    error: string;
    durationMs: number;
  };
}

/** Emitted after a pairwise comparison produced a winner (or none) */
export interface ComparisonCompleted extends BaseEvent {
  type: 'ComparisonCompleted';
  payload: {
    winner: 1 | 2 | 'undetermined';
    response1Score: number;
    response2Score: number;
    parseStage: ParseStage;
    durationMs: number;
  };
}

/** Emitted when a comparison could not be completed */
export interface ComparisonFailed extends BaseEvent {
  type: 'ComparisonFailed';
  payload: {
    error: string;
    durationMs: number;
  };
}

/** Emitted after a validator chain ran over a candidate text */
export interface ValidationCompleted extends BaseEvent {
  type: 'ValidationCompleted';
  payload: {
    isValid: boolean;
    ruleCount: number;
    errorCount: number;
  };
}

/** Emitted when the target model returned a response to be judged */
export interface TargetResponseReceived extends BaseEvent {
  type: 'TargetResponseReceived';
  payload: {
    responseChars: number;
    durationMs: number;
  };
}

/**
 * Union of all evalkit events.
 */
export type EvalEvent =
  | JudgeRequested
  | JudgeCompleted
  | JudgeFailed
  | ComparisonCompleted
  | ComparisonFailed
  | ValidationCompleted
  | TargetResponseReceived;

/** Current event schema version. */
export const EVENT_SCHEMA_VERSION = 1;
