/**
 * Configuration module exports
 */

export { DEFAULT_CONFIG_PATH, loadConfig, parseConfig } from './tracker.js';
