export { CallbackRegistry } from './CallbackRegistry.js';
export type { CallbackFn, CallbackOptions, CallbackOutcome } from './types.js';
