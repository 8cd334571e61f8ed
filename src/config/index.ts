export { loadConfig, formatUsage, DEFAULT_CONFIG_FILE, type LoadConfigOptions, type LoadedConfig } from './loader.js'
export { ProvisionConfigSchema, RefreshPolicySchema, defaultConfig, type ProvisionConfig, type ProvisionConfigInput, type RefreshPolicy } from './schema.js'
