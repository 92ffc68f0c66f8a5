import { createLogger } from '@infobox-query/utils';
import type { FieldSpec, IFieldLookup } from '../types.js';
import { FieldNotFoundError, LookupUnavailableError, TopicNotFoundError } from '../errors.js';
import { WikipediaClient, WikipediaError } from './client.js';
import { infoboxText } from './infobox.js';
import { extractField, fieldNotFoundMessage } from './fields.js';

const logger = createLogger({ service: 'wikipedia-lookup' });

/**
 * Reads single fields from the summary box ("infobox") of the Wikipedia page
 * that best matches a topic.
 */
export class WikipediaFieldLookup implements IFieldLookup {
  constructor(private readonly client: WikipediaClient) {}

  async lookupField(topic: string, field: FieldSpec): Promise<string> {
    const html = await this.fetchPage(topic);

    const text = infoboxText(html);
    if (text === undefined) {
      throw new FieldNotFoundError(topic, field.kind, 'Page has no infobox');
    }

    const value = extractField(text, field);
    if (value === undefined) {
      logger.info({ topic, field: field.kind }, 'Field not present in infobox');
      throw new FieldNotFoundError(topic, field.kind, fieldNotFoundMessage(field));
    }

    return value;
  }

  private async fetchPage(topic: string): Promise<string> {
    const titleResult = await this.client.searchTitle(topic);
    if (!titleResult.ok) {
      throw this.unavailable(topic, titleResult.error);
    }
    if (titleResult.value === null) {
      throw new TopicNotFoundError(topic);
    }

    const htmlResult = await this.client.getPageHtml(titleResult.value);
    if (!htmlResult.ok) {
      throw this.unavailable(topic, htmlResult.error);
    }
    if (htmlResult.value === null) {
      throw new TopicNotFoundError(topic, `Page "${titleResult.value}" does not exist`);
    }

    return htmlResult.value;
  }

  private unavailable(topic: string, error: WikipediaError): LookupUnavailableError {
    logger.warn({ topic, code: error.code, details: error.details }, 'Wikipedia lookup failed');
    return new LookupUnavailableError(topic, error.message, error);
  }
}

export function createWikipediaFieldLookup(client?: WikipediaClient): WikipediaFieldLookup {
  return new WikipediaFieldLookup(client ?? new WikipediaClient());
}
