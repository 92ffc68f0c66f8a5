import { createLogger } from '@infobox-query/utils';
import { QueryTableError, QueryTableErrorCode } from '../errors.js';
import type { ActionRegistry, PatternTable, PatternTableEntry } from '../types/query.js';
import { countWildcards, formatPattern, parsePattern } from './pattern.js';

const logger = createLogger({ service: 'pattern-table' });

/**
 * One declared row of the query table: a source pattern and the id of the
 * action it triggers.
 */
export interface PatternTableSource {
  pattern: string;
  action: string;
  description?: string;
}

export interface SupportedQuery {
  pattern: string;
  description?: string;
}

/**
 * Build the immutable pattern table. Order is kept as given and is the match
 * priority. Every action id must exist in `registry` and take as many captures
 * as its pattern has wildcards.
 *
 * @throws QueryTableError on an unknown action or an arity mismatch
 */
export function createPatternTable(
  sources: readonly PatternTableSource[],
  registry: ActionRegistry
): PatternTable {
  const entries = sources.map((source): PatternTableEntry => {
    const action = Object.hasOwn(registry, source.action) ? registry[source.action] : undefined;

    if (action === undefined) {
      throw new QueryTableError(
        QueryTableErrorCode.UNKNOWN_ACTION,
        `Unknown action "${source.action}"`,
        source.pattern
      );
    }

    const pattern = parsePattern(source.pattern);
    const wildcards = countWildcards(pattern);

    if (wildcards !== action.arity) {
      throw new QueryTableError(
        QueryTableErrorCode.ARITY_MISMATCH,
        `Pattern has ${wildcards} wildcard(s) but action "${source.action}" takes ${action.arity}`,
        source.pattern
      );
    }

    return Object.freeze({
      source: source.pattern,
      pattern,
      actionId: source.action,
      action,
      description: source.description ?? action.description,
    });
  });

  logger.debug({ entries: entries.length }, 'Pattern table built');

  return Object.freeze(entries);
}

/**
 * Supported queries in priority order, for help output.
 */
export function listSupportedQueries(table: PatternTable): SupportedQuery[] {
  return table.map((entry) => ({
    pattern: formatPattern(entry.pattern),
    description: entry.description,
  }));
}
