export { loadSettings, parseSettings, defaultSettingsPath, SettingsError } from './settings';
export { loadEnvConfig, readEnvConfig } from './env';
export type { Settings, LoggingConfig, InputConfig, ReportConfig, EnvConfig } from './types';
