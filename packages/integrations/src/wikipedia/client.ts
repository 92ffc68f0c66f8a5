import {
  ok,
  err,
  Result,
  RetryOptions,
  withRetry,
  retryPresets,
  CircuitBreaker,
  createCircuitBreaker,
  circuitBreakerPresets,
  isCircuitOpenError,
  createLogger,
} from '@infobox-query/utils';
import { getEnv } from '@infobox-query/config';
import { z } from 'zod';

const logger = createLogger({ service: 'wikipedia-client' });

export const WikipediaErrorCode = {
  API_ERROR: 'API_ERROR',
  UNAVAILABLE: 'UNAVAILABLE',
  INVALID_RESPONSE: 'INVALID_RESPONSE',
} as const;
export type WikipediaErrorCode = (typeof WikipediaErrorCode)[keyof typeof WikipediaErrorCode];

export interface WikipediaError {
  code: WikipediaErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface WikipediaClientOptions {
  apiUrl: string;
  userAgent: string;
  timeoutMs: number;
  fetch: FetchLike;
  retry: Partial<RetryOptions>;
}

// MediaWiki reports failures in the body, usually with HTTP 200
const apiErrorSchema = z.object({
  code: z.string(),
  info: z.string().optional(),
});

const searchResponseSchema = z.object({
  query: z
    .object({
      search: z.array(z.object({ title: z.string() })),
    })
    .optional(),
  error: apiErrorSchema.optional(),
});

const parseResponseSchema = z.object({
  parse: z
    .object({
      title: z.string(),
      text: z.string(),
    })
    .optional(),
  error: apiErrorSchema.optional(),
});

// Replication lag above the requested maxlag; the request should be repeated later
const maxlagResponseSchema = z.object({
  error: z.object({ code: z.literal('maxlag'), info: z.string().optional() }),
});

const MISSING_PAGE_CODES = new Set(['missingtitle', 'invalidtitle', 'nosuchpageid']);

export class WikipediaClient {
  private readonly options: WikipediaClientOptions;
  private readonly circuitBreaker: CircuitBreaker;

  constructor(options: Partial<WikipediaClientOptions> = {}) {
    const env = getEnv();
    this.options = {
      apiUrl: options.apiUrl ?? env.WIKIPEDIA_API_URL,
      userAgent: options.userAgent ?? env.HTTP_USER_AGENT,
      timeoutMs: options.timeoutMs ?? env.LOOKUP_TIMEOUT_MS,
      fetch: options.fetch ?? ((url, init) => fetch(url, init)),
      retry: options.retry ?? retryPresets.wikipedia,
    };
    this.circuitBreaker = createCircuitBreaker('wikipedia', {
      ...circuitBreakerPresets.wikipedia,
      timeoutMs: this.options.timeoutMs,
    });
  }

  /**
   * Best search hit for a free-text topic, or null when nothing matches
   */
  async searchTitle(topic: string): Promise<Result<string | null, WikipediaError>> {
    const result = await this.request(
      { action: 'query', list: 'search', srsearch: topic, srlimit: '1' },
      searchResponseSchema
    );
    if (!result.ok) {
      return result;
    }

    const { query, error } = result.value;
    if (error) {
      return err({
        code: WikipediaErrorCode.API_ERROR,
        message: error.info ?? error.code,
        details: { apiCode: error.code, topic },
      });
    }

    const title = query?.search[0]?.title ?? null;
    logger.debug({ topic, title }, 'Resolved search topic');
    return ok(title);
  }

  /**
   * Rendered HTML of a page, or null when the page does not exist
   */
  async getPageHtml(title: string): Promise<Result<string | null, WikipediaError>> {
    const result = await this.request(
      { action: 'parse', page: title, prop: 'text', redirects: '1' },
      parseResponseSchema
    );
    if (!result.ok) {
      return result;
    }

    const { parse, error } = result.value;
    if (error) {
      if (MISSING_PAGE_CODES.has(error.code)) {
        return ok(null);
      }
      return err({
        code: WikipediaErrorCode.API_ERROR,
        message: error.info ?? error.code,
        details: { apiCode: error.code, title },
      });
    }

    return ok(parse?.text ?? null);
  }

  private buildUrl(params: Record<string, string>): string {
    const url = new URL(this.options.apiUrl);
    for (const [key, value] of Object.entries({ ...params, format: 'json', formatversion: '2' })) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  private async request<T>(
    params: Record<string, string>,
    schema: z.ZodType<T>
  ): Promise<Result<T, WikipediaError>> {
    const url = this.buildUrl(params);

    const cbResult = await this.circuitBreaker.execute(async (signal) => {
      const result = await withRetry(async () => {
        logger.debug({ action: params['action'], url }, 'Wikipedia request');

        const response = await this.options.fetch(url, {
          signal,
          headers: {
            Accept: 'application/json',
            'User-Agent': this.options.userAgent,
            'Api-User-Agent': this.options.userAgent,
          },
        });

        if (!response.ok) {
          throw new Error(`Wikipedia API returned HTTP ${response.status}`);
        }

        const body: unknown = await response.json();

        const maxlag = maxlagResponseSchema.safeParse(body);
        if (maxlag.success) {
          throw new Error(`Wikipedia API maxlag: ${maxlag.data.error.info ?? 'server lagged'}`);
        }

        return body;
      }, { ...this.options.retry, signal });

      if (!result.ok) {
        throw result.error.lastError;
      }

      return result.value;
    });

    if (!cbResult.ok) {
      logger.warn({ action: params['action'], error: cbResult.error.message }, 'Wikipedia request failed');
      return err({
        code: WikipediaErrorCode.UNAVAILABLE,
        message: cbResult.error.message,
        details: { circuitOpen: isCircuitOpenError(cbResult.error) },
      });
    }

    const validated = schema.safeParse(cbResult.value);
    if (!validated.success) {
      logger.warn({ action: params['action'], error: validated.error.format() }, 'Unexpected Wikipedia response');
      return err({
        code: WikipediaErrorCode.INVALID_RESPONSE,
        message: 'Unexpected response from Wikipedia API',
      });
    }

    return ok(validated.data);
  }
}
