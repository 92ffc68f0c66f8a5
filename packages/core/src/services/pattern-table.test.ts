import { describe, it, expect } from 'vitest';
import { createPatternTable, listSupportedQueries } from './pattern-table.js';
import { parsePattern } from './pattern.js';
import { answers, defineAction } from '../actions/action.js';
import { QueryTableError, QueryTableErrorCode } from '../errors.js';

const registry = {
  echo: defineAction({ arity: 1, description: 'Repeat the words', run: async ([value]) => answers([value]) }),
  pair: defineAction({ arity: 2, run: async ([a, b]) => answers([a, b]) }),
  none: defineAction({ arity: 0, run: async () => answers([]) }),
};

describe('createPatternTable', () => {
  it('keeps declaration order and binds each pattern to its action', () => {
    const table = createPatternTable(
      [
        { pattern: 'say %', action: 'echo' },
        { pattern: '_ and _', action: 'pair' },
        { pattern: 'nothing', action: 'none' },
      ],
      registry
    );

    expect(table.map((entry) => entry.source)).toEqual(['say %', '_ and _', 'nothing']);
    expect(table.map((entry) => entry.actionId)).toEqual(['echo', 'pair', 'none']);
    expect(table[1]?.action).toBe(registry.pair);
    expect(table[0]?.pattern).toEqual(parsePattern('say %'));
  });

  it('freezes the table and its entries', () => {
    const table = createPatternTable([{ pattern: 'say %', action: 'echo' }], registry);

    expect(Object.isFrozen(table)).toBe(true);
    expect(Object.isFrozen(table[0])).toBe(true);
  });

  it('rejects an unknown action id', () => {
    const build = () => createPatternTable([{ pattern: 'say %', action: 'shout' }], registry);

    expect(build).toThrow(QueryTableError);
    expect(build).toThrow('Unknown action "shout"');
  });

  it('does not resolve action ids through the prototype chain', () => {
    expect(() => createPatternTable([{ pattern: 'x', action: 'toString' }], registry)).toThrow(
      'Unknown action "toString"'
    );
  });

  it('rejects a pattern whose wildcard count differs from the action arity', () => {
    try {
      createPatternTable([{ pattern: 'say _ %', action: 'echo' }], registry);
      expect.fail('expected QueryTableError');
    } catch (error) {
      expect(error).toBeInstanceOf(QueryTableError);
      expect(error).toMatchObject({
        code: QueryTableErrorCode.ARITY_MISMATCH,
        pattern: 'say _ %',
        message: 'Pattern has 2 wildcard(s) but action "echo" takes 1',
      });
    }
  });

  it('builds an empty table from no entries', () => {
    expect(createPatternTable([], registry)).toEqual([]);
  });
});

describe('listSupportedQueries', () => {
  it('lists normalized patterns in priority order', () => {
    const table = createPatternTable(
      [
        { pattern: 'say   %', action: 'echo' },
        { pattern: '_ and _', action: 'pair', description: 'Two words' },
      ],
      registry
    );

    expect(listSupportedQueries(table)).toEqual([
      { pattern: 'say %', description: 'Repeat the words' },
      { pattern: '_ and _', description: 'Two words' },
    ]);
  });

  it('prefers the declared description over the action one', () => {
    const table = createPatternTable([{ pattern: 'say %', action: 'echo', description: 'Echo' }], registry);

    expect(listSupportedQueries(table)[0]?.description).toBe('Echo');
  });

  it('leaves the description out when neither side has one', () => {
    const table = createPatternTable([{ pattern: 'nothing', action: 'none' }], registry);

    expect(listSupportedQueries(table)).toEqual([{ pattern: 'nothing', description: undefined }]);
  });
});
