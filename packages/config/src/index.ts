export { loadRuntimeConfig, type RuntimeConfig } from './env.js';
