// Pattern domain types

// A token is one whitespace-delimited word, already case-normalized by the caller
export type Token = string;

export const PatternElementKind = {
  LITERAL: 'literal',
  SINGLE: 'single',
  MULTI: 'multi',
} as const;
export type PatternElementKind = (typeof PatternElementKind)[keyof typeof PatternElementKind];

// Source-pattern spelling of the wildcards
export const WildcardMarker = {
  SINGLE: '_',
  MULTI: '%',
} as const;
export type WildcardMarker = (typeof WildcardMarker)[keyof typeof WildcardMarker];

export interface LiteralElement {
  readonly kind: typeof PatternElementKind.LITERAL;
  readonly token: Token;
}

// Matches exactly one token
export interface SingleWildcard {
  readonly kind: typeof PatternElementKind.SINGLE;
}

// Matches zero or more tokens, captured space-joined
export interface MultiWildcard {
  readonly kind: typeof PatternElementKind.MULTI;
}

export type PatternElement = LiteralElement | SingleWildcard | MultiWildcard;

export type Pattern = readonly PatternElement[];

// One entry per wildcard, in the order the wildcards appear in the pattern
export type CaptureSet = readonly string[];
