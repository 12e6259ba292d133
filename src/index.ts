export * from './lib/num/index.js';
export { seededRNG, cryptoRNG } from './util/rng.js';
export type { RNG } from './util/rng.js';
export { getConfig, loadConfig, resetConfigCache, DEFAULT_RANDOM_MAX_DIGITS } from './config/index.js';
export type { AppConfig, LogLevel } from './config/index.js';
