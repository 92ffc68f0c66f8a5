export {
  WikipediaClient,
  WikipediaErrorCode,
  type WikipediaError,
  type WikipediaClientOptions,
  type FetchLike,
} from './client.js';
export { WikipediaFieldLookup, createWikipediaFieldLookup } from './lookup.js';
export { findInfobox, elementText, cleanText, infoboxText } from './infobox.js';
export { extractField, fieldPattern, fieldNotFoundMessage } from './fields.js';
