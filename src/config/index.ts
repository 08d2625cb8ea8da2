export {
  ConfigError,
  type Environment,
  getConfig,
  loadConfig,
  loadConfigFile,
  loadConfigFromEnv,
  parseConfig,
  resetConfig,
  resolveEnvVars
} from './config';
export { type Config, type ConfigInput, configSchema, type Neo4jSettings } from './schema';
