import {
  CaptureArity,
  Captures,
  OutcomeKind,
  QueryAction,
  QueryOutcome,
  AnswersOutcome,
  TerminateOutcome,
} from '../types/query.js';
import type { CaptureSet } from '../types/pattern.js';

export const answers = (values: readonly string[]): AnswersOutcome => ({
  kind: OutcomeKind.ANSWERS,
  answers: values,
});

export const terminate = (): TerminateOutcome => ({ kind: OutcomeKind.TERMINATE });

/**
 * Declare an action over a fixed number of captures. The arity is checked
 * against the bound pattern when the table is built.
 */
export function defineAction<N extends CaptureArity>(definition: {
  arity: N;
  description?: string;
  run: (captures: Captures<N>) => Promise<QueryOutcome>;
}): QueryAction<N> {
  return Object.freeze({
    arity: definition.arity,
    description: definition.description,
    run: definition.run,
  });
}

export function hasArity<N extends CaptureArity>(captures: CaptureSet, arity: N): captures is Captures<N> {
  return captures.length === arity;
}
