/**
 * @cfdi-bundle/contracts
 *
 * TypeScript interfaces and types for the CFDI submission bundle pipeline.
 * This package has zero runtime dependencies.
 *
 * @packageDocumentation
 */

// Core types
export * from './core/invoice-record.js';
export * from './core/uploaded-file.js';
export * from './core/association.js';
export * from './core/submission.js';
export * from './core/diagnostic.js';

// Configuration
export * from './config/build-config.js';
