/**
 * @invoice-codec/contracts
 *
 * Shared types for the invoice codec packages.
 * This package has zero runtime dependencies.
 *
 * @packageDocumentation
 */

// Scalars
export * from './core/scalars.js';

// Document tree
export * from './document/node.js';

// Schema validation
export * from './validation/schema-validator.js';
