import { createInterface } from 'node:readline';
import {
  dispatch,
  listSupportedQueries,
  OutcomeKind,
  tokenizeQuery,
  type PatternTable,
} from '@infobox-query/core';
import { isLookupError, LookupErrorCode } from '@infobox-query/integrations';
import { createLogger, toError } from '@infobox-query/utils';

const logger = createLogger({ service: 'cli-session' });

export const WELCOME = 'Welcome to the wikipedia chatbot!';
export const PROMPT = 'Your query? ';
export const FAREWELL = 'So long!';

export interface SessionReply {
  lines: string[];
  done: boolean;
}

/**
 * What a failed query prints. Lookup misses name what was not found; anything
 * else is reported generically and logged in full.
 */
export function describeFailure(error: unknown): string {
  if (isLookupError(error) && error.code !== LookupErrorCode.LOOKUP_UNAVAILABLE) {
    logger.warn({ code: error.code, topic: error.topic }, error.message);
    return `Sorry, I couldn't find that: ${error.message}`;
  }

  const failure = toError(error);
  logger.error({ error: failure }, 'Query failed');
  return `Sorry, something went wrong: ${failure.message}`;
}

/**
 * Answer one line of user input. Failures are turned into a reply so the
 * session can carry on with the next query.
 */
export async function replyTo(table: PatternTable, text: string): Promise<SessionReply> {
  try {
    const outcome = await dispatch(table, tokenizeQuery(text));

    if (outcome.kind === OutcomeKind.TERMINATE) {
      return { lines: [], done: true };
    }
    return { lines: [...outcome.answers], done: false };
  } catch (error) {
    return { lines: [describeFailure(error)], done: false };
  }
}

export interface AskStreams {
  out: NodeJS.WritableStream;
  err: NodeJS.WritableStream;
}

/**
 * Answer a single query. Resolves to the exit code: 0 on answers or
 * termination, 1 when the lookup fails. Other errors propagate.
 */
export async function askOnce(table: PatternTable, text: string, { out, err }: AskStreams): Promise<number> {
  try {
    const outcome = await dispatch(table, tokenizeQuery(text));
    if (outcome.kind === OutcomeKind.ANSWERS) {
      outcome.answers.forEach((answer) => out.write(`${answer}\n`));
    }
    return 0;
  } catch (error) {
    if (!isLookupError(error)) {
      throw error;
    }
    err.write(`${error.message}\n`);
    return 1;
  }
}

// One line per table entry: the pattern, padded, then what it answers
export function formatSupportedQueries(table: PatternTable): string[] {
  const queries = listSupportedQueries(table);
  const width = Math.max(0, ...queries.map((query) => query.pattern.length));

  return queries.map(({ pattern, description }) =>
    description === undefined ? pattern : `${pattern.padEnd(width)}  ${description}`
  );
}

export interface SessionOptions {
  table: PatternTable;
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Interactive read-print loop. Ends on the termination query, on end of input
 * (Ctrl-D) or on interrupt (Ctrl-C).
 */
export async function runSession({ table, input, output }: SessionOptions): Promise<void> {
  const write = (line: string) => {
    output.write(`${line}\n`);
  };

  const rl = createInterface({ input, output });
  rl.on('SIGINT', () => rl.close());

  write(WELCOME);
  rl.setPrompt(PROMPT);
  rl.prompt();

  // Leaving the loop closes the interface
  for await (const line of rl) {
    const reply = await replyTo(table, line);
    reply.lines.forEach(write);

    if (reply.done) {
      break;
    }
    rl.prompt();
  }

  write(FAREWELL);
}
