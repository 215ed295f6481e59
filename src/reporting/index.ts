export type { Logger } from './logger.js';
export { consoleLogger, silentLogger } from './logger.js';
export type { RendererOptions } from './renderer.js';
export { renderConfusionMatrix } from './renderer.js';
