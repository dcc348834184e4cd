export { ConfigLoader, CONFIG_FILE_NAMES, type ResolveConfigOptions, type ResolvedConfig } from './loader.js';
export { validateConfig, validateWeightOrder, type PartialArchdocsConfig } from './validator.js';
