// Core module exports
export { loadConfig, ConfigLoadError, type RuntimeConfig } from './config.js';
export { createLogger, silentLogger, type Logger } from './logger.js';
export { EventChannel } from './channel.js';
export { abortable } from './abortable.js';
