/**
 * Parley - Types Index
 * Re-exports all types from this module
 */

export * from './messages.js';
