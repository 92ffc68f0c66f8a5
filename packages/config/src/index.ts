export { type Env, getEnv, parseEnv } from './env.js';
export {
  type QueryTableEntry,
  type QueryTableConfig,
  loadQueryTable,
  parseQueryTable,
  getDefaultQueryTable,
  defaultQueryTablePath,
  clearQueryTableCache,
} from './query-table.js';
