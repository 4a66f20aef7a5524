export {
  loadConfig,
  loadEnvFile,
  DEFAULT_LOG_FILE,
  DEFAULT_ENV_FILE,
  type AppConfig,
} from './config.js';
