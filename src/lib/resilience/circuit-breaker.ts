/**
 * Circuit breaker wrapper around cockatiel.
 *
 * - CLOSED: calls pass through
 * - OPEN: after `failureThreshold` consecutive failures every call fails fast
 * - HALF_OPEN: after `resetTimeoutMs` one trial call decides the next state
 */

import {
  BrokenCircuitError,
  CircuitState,
  ConsecutiveBreaker,
  circuitBreaker,
  handleAll,
} from "cockatiel";

export type CircuitBreakerState = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface CircuitBreakerConfig {
  /** Number of consecutive failures before opening circuit */
  failureThreshold: number;
  /** Time in ms before attempting HALF_OPEN from OPEN */
  resetTimeoutMs: number;
}

export interface CircuitBreakerStats {
  state: CircuitBreakerState;
  totalCalls: number;
  failedCalls: number;
  rejectedCalls: number;
}

export interface CircuitBreaker {
  /** Execute a function through the circuit breaker */
  execute: <T>(fn: () => Promise<T>) => Promise<T>;
  getState: () => CircuitBreakerState;
  isOpen: () => boolean;
  getStats: () => CircuitBreakerStats;
  /** Subscribe to state change events */
  onStateChange: (callback: (state: CircuitBreakerState) => void) => () => void;
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  resetTimeoutMs: 30000,
};

export class CircuitOpenError extends Error {
  constructor(message = "Circuit breaker is open") {
    super(message);
    this.name = "CircuitOpenError";
  }
}

const mapCircuitState = (state: CircuitState): CircuitBreakerState => {
  switch (state) {
    case CircuitState.Closed:
      return "CLOSED";
    case CircuitState.Open:
    case CircuitState.Isolated:
      return "OPEN";
    case CircuitState.HalfOpen:
      return "HALF_OPEN";
    default:
      return "CLOSED";
  }
};

/**
 * Creates a consecutive-failure circuit breaker.
 *
 * @example
 * ```typescript
 * const breaker = createCircuitBreaker({ failureThreshold: 5, resetTimeoutMs: 30000 });
 * const document = await breaker.execute(() => postToEngine(body));
 * ```
 */
export const createCircuitBreaker = (
  config: CircuitBreakerConfig = DEFAULT_CIRCUIT_BREAKER_CONFIG,
): CircuitBreaker => {
  const { failureThreshold, resetTimeoutMs } = config;

  const breaker = circuitBreaker(handleAll, {
    halfOpenAfter: resetTimeoutMs,
    breaker: new ConsecutiveBreaker(failureThreshold),
  });

  const stateChangeListeners = new Set<(state: CircuitBreakerState) => void>();

  breaker.onStateChange((state) => {
    const mappedState = mapCircuitState(state);
    for (const listener of stateChangeListeners) {
      listener(mappedState);
    }
  });

  let totalCalls = 0;
  let failedCalls = 0;
  let rejectedCalls = 0;

  const execute = async <T>(fn: () => Promise<T>): Promise<T> => {
    totalCalls++;
    try {
      return await breaker.execute(fn);
    } catch (error) {
      if (error instanceof BrokenCircuitError) {
        rejectedCalls++;
        throw new CircuitOpenError(`Circuit breaker is open after ${failureThreshold} failures`);
      }
      failedCalls++;
      throw error;
    }
  };

  const getState = (): CircuitBreakerState => mapCircuitState(breaker.state);

  const onStateChange = (callback: (state: CircuitBreakerState) => void): (() => void) => {
    stateChangeListeners.add(callback);
    return () => {
      stateChangeListeners.delete(callback);
    };
  };

  return {
    execute,
    getState,
    isOpen: () => getState() === "OPEN",
    getStats: () => ({ state: getState(), totalCalls, failedCalls, rejectedCalls }),
    onStateChange,
  };
};
