export {
  CircuitBreaker,
  CircuitOpenError,
  type CircuitBreakerOptions,
  type CircuitSnapshot,
  type CircuitState,
} from "./circuit-breaker.js";
