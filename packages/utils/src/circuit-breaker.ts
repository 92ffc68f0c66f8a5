import { Result, ok, err, toError } from './result.js';
import { logger } from './logger.js';

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerOptions {
  name: string;
  failureThreshold: number;
  successThreshold: number;
  timeoutMs: number;
  resetTimeoutMs: number;
  onStateChange?: (name: string, from: CircuitState, to: CircuitState) => void;
}

export interface CircuitBreakerError {
  type: 'circuit_open';
  message: string;
  circuitName: string;
}

export const isCircuitOpenError = (error: CircuitBreakerError | Error): error is CircuitBreakerError =>
  !(error instanceof Error) && error.type === 'circuit_open';

/**
 * Guards calls to an upstream that may be down.
 *
 * `failureThreshold` failures in a row open the circuit: calls are refused
 * without running until `resetTimeoutMs` has passed since it opened. The next
 * call then probes in half-open state; `successThreshold` successes close the
 * circuit again and any failure reopens it. A call still running after
 * `timeoutMs` fails, and the signal it was given is aborted.
 */
export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private failures = 0;
  private probeSuccesses = 0;
  private openedAt: number | undefined;

  constructor(private readonly options: CircuitBreakerOptions) {}

  async execute<T>(
    fn: (signal: AbortSignal) => Promise<T>
  ): Promise<Result<T, CircuitBreakerError | Error>> {
    if (this.state === 'open') {
      if (!this.resetTimeoutElapsed()) {
        return err({
          type: 'circuit_open',
          message: `Circuit breaker '${this.options.name}' is open`,
          circuitName: this.options.name,
        });
      }
      this.transitionTo('half-open');
    }

    try {
      const value = await this.runWithDeadline(fn);
      this.recordSuccess();
      return ok(value);
    } catch (e) {
      this.recordFailure();
      return err(toError(e));
    }
  }

  private async runWithDeadline<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const timeout = new Error(
          `Circuit breaker '${this.options.name}' timeout after ${this.options.timeoutMs}ms`
        );
        controller.abort(timeout);
        reject(timeout);
      }, this.options.timeoutMs);
    });

    try {
      return await Promise.race([fn(controller.signal), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private recordSuccess(): void {
    this.failures = 0;

    if (this.state === 'half-open') {
      this.probeSuccesses++;
      if (this.probeSuccesses >= this.options.successThreshold) {
        this.probeSuccesses = 0;
        this.transitionTo('closed');
      }
    }
  }

  private recordFailure(): void {
    this.failures++;
    this.probeSuccesses = 0;

    const tripped = this.state === 'closed' && this.failures >= this.options.failureThreshold;
    if (tripped || this.state === 'half-open') {
      this.openedAt = Date.now();
      this.transitionTo('open');
    }
  }

  private resetTimeoutElapsed(): boolean {
    return this.openedAt === undefined || Date.now() - this.openedAt >= this.options.resetTimeoutMs;
  }

  private transitionTo(next: CircuitState): void {
    const previous = this.state;
    this.state = next;

    logger.info({ circuitName: this.options.name, from: previous, to: next }, 'Circuit breaker state change');
    this.options.onStateChange?.(this.options.name, previous, next);
  }

  getState(): CircuitState {
    return this.state;
  }

  getStats(): { state: CircuitState; failureCount: number; successCount: number } {
    return {
      state: this.state,
      failureCount: this.failures,
      successCount: this.probeSuccesses,
    };
  }
}

const defaultCircuitBreakerOptions: Omit<CircuitBreakerOptions, 'name'> = {
  failureThreshold: 5,
  successThreshold: 2,
  timeoutMs: 30000,
  resetTimeoutMs: 60000,
};

export function createCircuitBreaker(
  name: string,
  options?: Partial<Omit<CircuitBreakerOptions, 'name'>>
): CircuitBreaker {
  return new CircuitBreaker({ name, ...defaultCircuitBreakerOptions, ...options });
}

export const circuitBreakerPresets = {
  // Wikipedia is the only upstream; give up on it quickly and retry within a minute
  wikipedia: {
    failureThreshold: 3,
    successThreshold: 1,
    timeoutMs: 15000,
    resetTimeoutMs: 30000,
  },
} as const satisfies Record<string, Partial<Omit<CircuitBreakerOptions, 'name'>>>;
