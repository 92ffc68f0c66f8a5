import { CaptureSet, Pattern, PatternElementKind, Token } from '../types/pattern.js';

// A pattern that does not describe the input; a normal outcome, not an error
export const NO_MATCH = null;
export type MatchResult = CaptureSet | typeof NO_MATCH;

/**
 * Match `pattern` against `input` from left to right.
 *
 * Literals must equal the next token. `_` takes exactly one token. `%` takes
 * zero or more: every split is tried, shortest first, until the rest of the
 * pattern matches the rest of the input, so with adjacent `%` the leftmost one
 * takes the fewest tokens. Worst case is exponential in the number of `%`.
 *
 * @returns one capture per wildcard in pattern order, or `NO_MATCH`
 */
export function match(pattern: Pattern, input: readonly Token[]): MatchResult {
  return matchFrom(pattern, 0, input, 0);
}

function matchFrom(
  pattern: Pattern,
  patternIndex: number,
  input: readonly Token[],
  inputIndex: number
): string[] | null {
  const element = pattern[patternIndex];

  if (element === undefined) {
    return inputIndex === input.length ? [] : null;
  }

  switch (element.kind) {
    case PatternElementKind.LITERAL: {
      if (input[inputIndex] !== element.token) {
        return null;
      }
      return matchFrom(pattern, patternIndex + 1, input, inputIndex + 1);
    }

    case PatternElementKind.SINGLE: {
      const token = input[inputIndex];
      if (token === undefined) {
        return null;
      }
      const rest = matchFrom(pattern, patternIndex + 1, input, inputIndex + 1);
      return rest === null ? null : [token, ...rest];
    }

    case PatternElementKind.MULTI: {
      for (let end = inputIndex; end <= input.length; end++) {
        const rest = matchFrom(pattern, patternIndex + 1, input, end);
        if (rest !== null) {
          return [input.slice(inputIndex, end).join(' '), ...rest];
        }
      }
      return null;
    }
  }
}
