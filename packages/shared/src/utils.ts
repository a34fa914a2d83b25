/**
 * Parley - Utility Functions
 * Shared utility functions used across the application
 */

import { OptionTarget } from './enums.js';
import { CommandSyntaxError } from './errors.js';

/**
 * Parses an option name as typed by a user (case-insensitive)
 */
export function parseOptionTarget(str: string): OptionTarget {
  const upper = str.trim().toUpperCase();
  const target = Object.values(OptionTarget).find((t) => t === upper);
  if (!target) {
    throw new CommandSyntaxError(`Unknown option '${str}'`);
  }
  return target;
}

/**
 * Returns the last segment of a path, accepting either separator
 */
export function baseName(path: string): string {
  const segments = path.split(/[\\/]/).filter((s) => s.length > 0);
  return segments.length > 0 ? segments[segments.length - 1] : '';
}

/**
 * Truncates a string to a maximum length with ellipsis
 */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - 3) + '...';
}

/**
 * Replaces every character with an asterisk
 */
export function mask(str: string): string {
  return '*'.repeat(str.length);
}
