import { createLogger } from '@infobox-query/utils';
import { QueryTableError, QueryTableErrorCode } from '../errors.js';
import type { Token } from '../types/pattern.js';
import { OutcomeKind, type QueryOutcome, type PatternTable } from '../types/query.js';
import { answers, hasArity } from '../actions/action.js';
import { match, NO_MATCH } from './matcher.js';

const logger = createLogger({ service: 'dispatcher' });

export const NO_ANSWERS = 'No answers';
export const NOT_UNDERSTOOD = "I don't understand";

/**
 * Answer a tokenized query with the first table entry whose pattern matches.
 *
 * An action that finds nothing yields `["No answers"]`; input no pattern
 * matches yields `["I don't understand"]`. Errors thrown by the action,
 * lookup failures included, are not caught.
 */
export async function dispatch(table: PatternTable, input: readonly Token[]): Promise<QueryOutcome> {
  for (const entry of table) {
    const captures = match(entry.pattern, input);
    if (captures === NO_MATCH) {
      continue;
    }

    logger.debug({ pattern: entry.source, action: entry.actionId, captures }, 'Query matched');

    // Only reachable with a table assembled by hand
    if (!hasArity(captures, entry.action.arity)) {
      throw new QueryTableError(
        QueryTableErrorCode.ARITY_MISMATCH,
        `Action "${entry.actionId}" takes ${entry.action.arity} capture(s), got ${captures.length}`,
        entry.source
      );
    }

    const outcome = await entry.action.run(captures);

    if (outcome.kind === OutcomeKind.TERMINATE) {
      return outcome;
    }
    return outcome.answers.length > 0 ? outcome : answers([NO_ANSWERS]);
  }

  logger.debug({ input }, 'No pattern matched');
  return answers([NOT_UNDERSTOOD]);
}
