export {
  EnvConfigError,
  booleanVar,
  integerVar,
  loadEnvConfig,
  stringVar,
  type BooleanVarOptions,
  type EnvSource,
  type IntegerVarOptions,
  type LoadEnvConfigOptions,
  type StringVarOptions
} from './envConfig';
export {
  createPostgresPool,
  quoteIdentifier,
  type PostgresErrorReporter,
  type PostgresHelpers,
  type PostgresPoolOptions
} from './postgres';
export { computeExponentialBackoff, type BackoffOptions } from './retries/backoff';
