// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Validation
export * from './validation/index.js';

// Observers
export * from './observers/index.js';

// Database
export * from './database/index.js';

// Observability
export * from './observability/index.js';
