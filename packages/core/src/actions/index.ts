import type { IFieldLookup } from '@infobox-query/integrations';
import { createFieldActions } from './field-actions.js';
import { sessionActions } from './session-actions.js';

export * from './action.js';
export * from './field-actions.js';
export * from './session-actions.js';

/**
 * Every action the default query table refers to, keyed by action id
 */
export function createDefaultActions(lookup: IFieldLookup) {
  return { ...createFieldActions(lookup), ...sessionActions };
}
