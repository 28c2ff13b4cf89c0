export {
  CircuitBreakerConfigSchema,
  CircuitBreakerConfigInput,
  TradingBreakerConfigSchema,
  TradingBreakerConfigInput,
  PortfolioSnapshotSchema,
  createCircuitBreakerConfig,
  createTradingBreakerConfig,
  parsePortfolioSnapshot,
} from './schema.js';
export { CircuitBreakerDefaults } from './defaults.js';
export {
  loadTradingBreakerConfig,
  loadTradingBreakerConfigFromEnvironment,
} from './EnvironmentLoader.js';
