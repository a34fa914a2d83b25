/**
 * Parley - Shared Package
 * Re-exports all shared types, enums, constants, and utilities
 */

// Enums
export * from './enums.js';

// Types
export * from './types/index.js';

// Constants
export * from './constants.js';

// Errors
export * from './errors.js';

// Utilities
export * from './utils.js';

// Message factories
export * from './messages.js';

// Command parsing
export * from './commands.js';
