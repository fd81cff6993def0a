export {
  registerPhasedShutdownHook,
  runShutdownHooks,
  setupGracefulShutdown,
} from './gracefulShutdown.js';
export type { ShutdownPhase } from './gracefulShutdown.js';
