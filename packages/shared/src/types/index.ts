/**
 * Courtside - Types Index
 * Re-exports all types from this module
 */

export * from './events';
export * from './dto';
