// Query action and dispatch outcome types

import type { Pattern } from './pattern.js';

export const OutcomeKind = {
  ANSWERS: 'answers',
  TERMINATE: 'terminate',
} as const;
export type OutcomeKind = (typeof OutcomeKind)[keyof typeof OutcomeKind];

export interface AnswersOutcome {
  readonly kind: typeof OutcomeKind.ANSWERS;
  readonly answers: readonly string[];
}

// Session-end request; a control signal, not an error
export interface TerminateOutcome {
  readonly kind: typeof OutcomeKind.TERMINATE;
}

export type QueryOutcome = AnswersOutcome | TerminateOutcome;

// Capture tuples by wildcard count
interface CaptureTuples {
  0: readonly [];
  1: readonly [string];
  2: readonly [string, string];
  3: readonly [string, string, string];
  4: readonly [string, string, string, string];
}
export type CaptureArity = keyof CaptureTuples;
export type Captures<N extends CaptureArity> = CaptureTuples[N];

export interface QueryAction<N extends CaptureArity = CaptureArity> {
  readonly arity: N;
  readonly description?: string;
  run(captures: Captures<N>): Promise<QueryOutcome>;
}

export type ActionRegistry = Readonly<Record<string, QueryAction>>;

export interface PatternTableEntry {
  readonly source: string;
  readonly pattern: Pattern;
  readonly actionId: string;
  readonly action: QueryAction;
  readonly description?: string;
}

// Ordered by priority; frozen once built
export type PatternTable = readonly PatternTableEntry[];
