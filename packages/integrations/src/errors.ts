import type { FieldKind } from './types.js';

export const LookupErrorCode = {
  TOPIC_NOT_FOUND: 'TOPIC_NOT_FOUND',
  FIELD_NOT_FOUND: 'FIELD_NOT_FOUND',
  LOOKUP_UNAVAILABLE: 'LOOKUP_UNAVAILABLE',
} as const;
export type LookupErrorCode = (typeof LookupErrorCode)[keyof typeof LookupErrorCode];

export class LookupError extends Error {
  constructor(
    public readonly code: LookupErrorCode,
    message: string,
    public readonly topic: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'LookupError';
  }
}

export class TopicNotFoundError extends LookupError {
  constructor(topic: string, message = `No page found for "${topic}"`) {
    super(LookupErrorCode.TOPIC_NOT_FOUND, message, topic);
    this.name = 'TopicNotFoundError';
  }
}

export class FieldNotFoundError extends LookupError {
  constructor(
    topic: string,
    public readonly field: FieldKind,
    message: string
  ) {
    super(LookupErrorCode.FIELD_NOT_FOUND, message, topic);
    this.name = 'FieldNotFoundError';
  }
}

export class LookupUnavailableError extends LookupError {
  constructor(topic: string, message: string, cause?: unknown) {
    super(LookupErrorCode.LOOKUP_UNAVAILABLE, message, topic, { cause });
    this.name = 'LookupUnavailableError';
  }
}

export const isLookupError = (error: unknown): error is LookupError => error instanceof LookupError;
