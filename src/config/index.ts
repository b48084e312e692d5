/**
 * Configuration - Central export
 */

export {
  createAppConfig,
  getConfigurationSummary,
  type AppConfig,
  type ConfigOverrides,
  type LogLevel,
  type OutputFormat,
} from './app-config';
