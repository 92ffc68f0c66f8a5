import type { Token } from '../types/pattern.js';

/**
 * Normalize a typed question into tokens: drop question marks, lower-case,
 * split on whitespace.
 */
export function tokenizeQuery(text: string): Token[] {
  return text
    .replace(/\?/g, '')
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => word.length > 0);
}
