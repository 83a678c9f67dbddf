/**
 * Core type definitions for the scanner.
 * Provides the Result type for error handling and the severity model.
 */

export * from './core';
export * from './severity';
