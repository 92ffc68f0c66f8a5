import { z } from 'zod';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import YAML from 'yaml';

// One declared row of the pattern table: `_` and `%` are the wildcards
const queryTableEntrySchema = z.object({
  pattern: z.string().trim().min(1),
  action: z.string().min(1),
  description: z.string().optional(),
});
export type QueryTableEntry = z.infer<typeof queryTableEntrySchema>;

const queryTableConfigSchema = z.object({
  version: z.string(),
  entries: z.array(queryTableEntrySchema).min(1),
});
export type QueryTableConfig = z.infer<typeof queryTableConfigSchema>;

const cachedTables = new Map<string, QueryTableConfig>();

// config/query-table.yaml at the repository root, wherever the process starts
export function defaultQueryTablePath(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(here, '..', '..', '..', 'config', 'query-table.yaml');
}

export function parseQueryTable(content: string): QueryTableConfig {
  const parsed: unknown = YAML.parse(content);

  const result = queryTableConfigSchema.safeParse(parsed);
  if (!result.success) {
    console.error('Invalid query table configuration:');
    console.error(result.error.format());
    throw new Error('Invalid query table configuration');
  }

  return result.data;
}

export function loadQueryTable(configPath?: string): QueryTableConfig {
  const tablePath = configPath ?? defaultQueryTablePath();

  const cached = cachedTables.get(tablePath);
  if (cached) {
    return cached;
  }

  if (!fs.existsSync(tablePath)) {
    console.warn(`Query table file not found at ${tablePath}, using default query table`);
    return getDefaultQueryTable();
  }

  const table = parseQueryTable(fs.readFileSync(tablePath, 'utf-8'));
  cachedTables.set(tablePath, table);
  return table;
}

export function clearQueryTableCache(): void {
  cachedTables.clear();
}

export function getDefaultQueryTable(): QueryTableConfig {
  return {
    version: '1.0',
    entries: [
      { pattern: 'when was % born', action: 'birth_date', description: 'Birth date of a person' },
      { pattern: 'what is the polar radius of %', action: 'polar_radius', description: 'Polar radius of a planet' },
      { pattern: 'what is the address of %', action: 'address', description: 'Street address of a school' },
      { pattern: 'what is the elevation of %', action: 'elevation', description: 'Elevation of an airport' },
      {
        pattern: 'what is the length of runway _ at %',
        action: 'runway_length',
        description: 'Length of a named runway at an airport',
      },
      { pattern: 'bye', action: 'bye', description: 'End the session' },
    ],
  };
}
