/**
 * Config module: configuration file, env overrides and rescale presets.
 */

export { ConfigManager, CONFIG_KEYS } from './config.js';
export type { IesnaConfig } from './config.js';
export { PRESETS, getPreset, listPresets } from './presets.js';
export type { RescalePreset } from './presets.js';
