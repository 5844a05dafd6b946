/**
 * @candle-sync/schemas
 *
 * Single source of truth for all Zod schemas and TypeScript types
 */

// Market data schemas
export * from './market/candle.schema';

// Collaborator contracts
export * from './adapter';

// Bulk-load dump documents
export * from './bulk-load/bulk-document.schema';

// Environment and configuration schemas
export * from './env/config.schema';
