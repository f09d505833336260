/**
 * Courtside - Shared Package
 * Re-exports all shared types, enums, constants, and utilities
 */

// Enums
export * from './enums';

// Types
export * from './types/index';

// Constants
export * from './constants';

// Utilities
export * from './utils';
