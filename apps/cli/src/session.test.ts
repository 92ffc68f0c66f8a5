import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PassThrough, Readable, Writable } from 'node:stream';
import { createDefaultActions, createPatternTable } from '@infobox-query/core';
import {
  FieldNotFoundError,
  LookupUnavailableError,
  TopicNotFoundError,
  type IFieldLookup,
} from '@infobox-query/integrations';
import {
  FAREWELL,
  PROMPT,
  WELCOME,
  askOnce,
  formatSupportedQueries,
  replyTo,
  runSession,
} from './session.js';

const lookupField = vi.fn<IFieldLookup['lookupField']>();

const table = createPatternTable(
  [
    { pattern: 'when was % born', action: 'birth_date' },
    { pattern: 'what is the elevation of %', action: 'elevation' },
    { pattern: 'bye', action: 'bye' },
  ],
  createDefaultActions({ lookupField })
);

async function runWith(lines: string[]): Promise<string> {
  const output = new PassThrough();
  const chunks: string[] = [];
  output.on('data', (chunk: Buffer) => chunks.push(chunk.toString()));

  await runSession({ table, input: Readable.from(lines.map((line) => Buffer.from(line))), output });

  return chunks.join('');
}

function collector() {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

describe('replyTo', () => {
  beforeEach(() => {
    lookupField.mockReset();
  });

  it('tokenizes the text and returns the answers', async () => {
    lookupField.mockResolvedValue('1815-12-10');

    await expect(replyTo(table, 'When was Ada Lovelace born?')).resolves.toEqual({
      lines: ['1815-12-10'],
      done: false,
    });
    expect(lookupField).toHaveBeenCalledWith('ada lovelace', { kind: 'birth_date' });
  });

  it('replies with the sentinel for an unknown query', async () => {
    await expect(replyTo(table, 'asdf qwer')).resolves.toEqual({
      lines: ["I don't understand"],
      done: false,
    });
  });

  it('finishes the session on bye', async () => {
    await expect(replyTo(table, 'Bye')).resolves.toEqual({ lines: [], done: true });
  });

  it('reports a missing topic or field and carries on', async () => {
    lookupField.mockRejectedValueOnce(new TopicNotFoundError('nobody'));
    lookupField.mockRejectedValueOnce(
      new FieldNotFoundError('mars', 'elevation', 'Page infobox has no elevation information')
    );

    await expect(replyTo(table, 'when was nobody born')).resolves.toEqual({
      lines: ['Sorry, I couldn\'t find that: No page found for "nobody"'],
      done: false,
    });
    await expect(replyTo(table, 'what is the elevation of mars')).resolves.toEqual({
      lines: ["Sorry, I couldn't find that: Page infobox has no elevation information"],
      done: false,
    });
  });

  it('reports an unreachable source as a generic failure', async () => {
    lookupField.mockRejectedValue(new LookupUnavailableError('mars', 'Wikipedia API returned HTTP 503'));

    await expect(replyTo(table, 'what is the elevation of mars')).resolves.toEqual({
      lines: ['Sorry, something went wrong: Wikipedia API returned HTTP 503'],
      done: false,
    });
  });
});

describe('runSession', () => {
  beforeEach(() => {
    lookupField.mockReset();
  });

  it('greets, answers each query and stops at bye', async () => {
    lookupField.mockResolvedValue('83');

    const output = await runWith(['what is the elevation of example airport\n', 'bye\n', 'when was x born\n']);

    expect(output).toBe(`${WELCOME}\n${PROMPT}83 ft\n${PROMPT}${FAREWELL}\n`);
    expect(lookupField).toHaveBeenCalledTimes(1);
  });

  it('says goodbye when the input ends', async () => {
    const output = await runWith(['asdf\n']);

    expect(output).toBe(`${WELCOME}\n${PROMPT}I don't understand\n${PROMPT}${FAREWELL}\n`);
  });
});

describe('askOnce', () => {
  beforeEach(() => {
    lookupField.mockReset();
  });

  it('prints the answers and exits 0', async () => {
    lookupField.mockResolvedValue('83');
    const out = collector();
    const err = collector();

    const code = await askOnce(table, 'what is the elevation of example airport', { out: out.stream, err: err.stream });

    expect(code).toBe(0);
    expect(out.text()).toBe('83 ft\n');
    expect(err.text()).toBe('');
  });

  it('prints the lookup message on stderr and exits 1', async () => {
    lookupField.mockRejectedValue(new TopicNotFoundError('nobody'));
    const out = collector();
    const err = collector();

    const code = await askOnce(table, 'when was nobody born', { out: out.stream, err: err.stream });

    expect(code).toBe(1);
    expect(out.text()).toBe('');
    expect(err.text()).toBe('No page found for "nobody"\n');
  });

  it('exits 0 silently on bye', async () => {
    const out = collector();
    const err = collector();

    await expect(askOnce(table, 'bye', { out: out.stream, err: err.stream })).resolves.toBe(0);
    expect(out.text()).toBe('');
    expect(err.text()).toBe('');
  });

  it('lets other failures propagate', async () => {
    lookupField.mockRejectedValue(new Error('boom'));
    const out = collector();
    const err = collector();

    await expect(askOnce(table, 'when was ada born', { out: out.stream, err: err.stream })).rejects.toThrow('boom');
  });
});

describe('formatSupportedQueries', () => {
  it('aligns each pattern with its description', () => {
    expect(formatSupportedQueries(table)).toEqual([
      'when was % born             Birth date of the named person',
      'what is the elevation of %  Elevation of the named airport, in feet',
      'bye                         End the session',
    ]);
  });
});
