export { CircuitBreaker, CircuitBreakerOptions } from './CircuitBreaker.js';
export { CircuitBreakerManager, CircuitBreakerManagerOptions } from './CircuitBreakerManager.js';
export {
  TradingCircuitBreakers,
  TradingCircuitBreakersOptions,
  breakerNameFor,
} from './TradingCircuitBreakers.js';
