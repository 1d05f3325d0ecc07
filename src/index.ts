/**
 * jlcheck Module
 * Exports the checker, rule registry, configuration and report types.
 */

export * from './check/index.js';
