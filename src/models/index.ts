/**
 * pdf-sweep - Data Models
 *
 * Barrel export for all model interfaces.
 */

export * from './cleaning.js';
export * from './compression.js';
export * from './processing.js';
