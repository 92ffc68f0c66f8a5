import {
  Pattern,
  PatternElement,
  PatternElementKind,
  WildcardMarker,
} from '../types/pattern.js';

const SINGLE: PatternElement = Object.freeze({ kind: PatternElementKind.SINGLE });
const MULTI: PatternElement = Object.freeze({ kind: PatternElementKind.MULTI });

export const literal = (token: string): PatternElement =>
  Object.freeze({ kind: PatternElementKind.LITERAL, token });

export const single = (): PatternElement => SINGLE;
export const multi = (): PatternElement => MULTI;

/**
 * Parse a whitespace-separated source pattern such as `what is the length of runway _ at %`.
 * `_` and `%` are wildcards only when they stand alone as a word.
 */
export function parsePattern(source: string): Pattern {
  const elements = source
    .trim()
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word): PatternElement => {
      switch (word) {
        case WildcardMarker.SINGLE:
          return SINGLE;
        case WildcardMarker.MULTI:
          return MULTI;
        default:
          return literal(word);
      }
    });

  return Object.freeze(elements);
}

export function formatPattern(pattern: Pattern): string {
  return pattern
    .map((element) => {
      switch (element.kind) {
        case PatternElementKind.LITERAL:
          return element.token;
        case PatternElementKind.SINGLE:
          return WildcardMarker.SINGLE;
        case PatternElementKind.MULTI:
          return WildcardMarker.MULTI;
      }
    })
    .join(' ');
}

export function countWildcards(pattern: Pattern): number {
  return pattern.filter((element) => element.kind !== PatternElementKind.LITERAL).length;
}
