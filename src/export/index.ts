/**
 * Export module
 */

export * from './markdown.js';
