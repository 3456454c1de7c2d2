export { ConfigManager } from './config.js';
export type { TesspipeConfig, OutputStyle } from './config.js';
