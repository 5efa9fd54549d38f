// Types
export * from './types/index.js';

// Core components
export * from './core/index.js';

// Evaluation
export * from './evaluation/index.js';

// Utils (koerce hodnot, vestavěné operátory)
export * from './utils/index.js';

// Validation
export * from './validation/index.js';

// Debugging (trace callbacky)
export * from './debugging/index.js';
