export const QueryTableErrorCode = {
  UNKNOWN_ACTION: 'UNKNOWN_ACTION',
  ARITY_MISMATCH: 'ARITY_MISMATCH',
} as const;
export type QueryTableErrorCode = (typeof QueryTableErrorCode)[keyof typeof QueryTableErrorCode];

export class QueryTableError extends Error {
  constructor(
    public readonly code: QueryTableErrorCode,
    message: string,
    public readonly pattern: string
  ) {
    super(message);
    this.name = 'QueryTableError';
  }
}
