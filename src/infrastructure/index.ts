export { default as storePlugin } from './store/store-plugin.js';
export type { StorePluginOptions } from './store/store-plugin.js';
export { default as pipelinePlugin } from './pipeline/pipeline-plugin.js';
export type { PipelinePluginOptions } from './pipeline/pipeline-plugin.js';
export { loadConfig, parseSimpleYaml, configSchema } from './config.js';
export type { ChatscribeConfig, LoadConfigOptions } from './config.js';
