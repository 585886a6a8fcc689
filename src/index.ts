export * from './application/sprite-export/index.js';
export * from './domain/sprite-export/index.js';
export * from './infrastructure/sprite-export/index.js';
export { SpritebakeError } from './shared/errors/base.error.js';
export { ValidationError } from './shared/errors/validation.error.js';
export { loadConfig, type SpritebakeConfig } from './shared/config/env.js';
