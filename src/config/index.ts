export { loadStubWeaveConfig, applyDefaults, CONFIG_DEFAULTS, CONFIG_FILENAME } from './loader';
export type { ConfigWarning, LoadConfigResult } from './loader';
export { stubWeaveConfigSchema } from './schema';
export type { StubWeaveConfigInput } from './schema';
