/**
 * @docextract/config
 *
 * Environment validation shared by the api-gateway and the worker.
 */
export { EnvironmentVariables, validateEnv } from './env.validation';
