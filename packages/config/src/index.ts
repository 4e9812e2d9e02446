export type { ConfigProvider } from './types';
export { EnvConfigProvider } from './env-config';
export { ValidatedConfig, MissingConfigError } from './validated-config';
export type { FailMode } from './validated-config';
