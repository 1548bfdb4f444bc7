// Main export file - re-exports the public API of each layer

export * from './core/index.js';
export * from './persistence/index.js';
export * from './oauth/index.js';
export * from './services/index.js';
export * from './http/index.js';

export { createCoreContext, type CoreContext, type CoreDependencies } from './context.js';

export {
  ConfigManager,
  loadEnvironment,
  type AppConfig,
} from './config/index.js';

export * from './utils/errors.js';
