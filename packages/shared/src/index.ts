/**
 * Veilpost - Shared Package
 * Re-exports wire types, schemas, enums, constants, and utilities
 */

// Enums
export * from './enums.js';

// Types
export * from './types/index.js';

// Schemas
export * from './schemas.js';

// Constants
export * from './constants.js';

// Utilities
export * from './utils.js';
