/**
 * Dataset module - reading and normalizing character tables
 *
 * @module dataset
 */

export * from './errors.js';
export * from './parse-rows.js';
export * from './remote-source.js';
export * from './sheet-reader.js';
export * from './dataset-loader.js';
