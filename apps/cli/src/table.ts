import { getEnv, loadQueryTable } from '@infobox-query/config';
import { createDefaultActions, createPatternTable, type PatternTable } from '@infobox-query/core';
import { createWikipediaFieldLookup } from '@infobox-query/integrations';

/**
 * Build the pattern table from the YAML query table, wired to Wikipedia.
 */
export function loadPatternTable(tablePath?: string): PatternTable {
  const config = loadQueryTable(tablePath ?? getEnv().QUERY_TABLE_PATH);
  return createPatternTable(config.entries, createDefaultActions(createWikipediaFieldLookup()));
}
