export { loadConfig, ConfigError, CONFIG_ENV_PREFIX } from './loader.js'
export { DEFAULT_CONFIG } from './defaults.js'
