// Result type
export {
  type Result,
  type Ok,
  type Err,
  ok,
  err,
  isOk,
  isErr,
  toError,
} from './result.js';

// Retry utilities
export {
  type RetryOptions,
  type RetryError,
  withRetry,
  retryPresets,
  defaultRetryOptions,
} from './retry.js';

// Logger
export {
  type Logger,
  type LogLevel,
  type LogContext,
  logger,
  createLogger,
  createRequestLogger,
} from './logger.js';

// Circuit Breaker
export {
  type CircuitState,
  type CircuitBreakerOptions,
  type CircuitBreakerError,
  CircuitBreaker,
  createCircuitBreaker,
  circuitBreakerPresets,
  isCircuitOpenError,
} from './circuit-breaker.js';
