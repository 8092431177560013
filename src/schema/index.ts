/**
 * Sheet and table definitions for the picking pipeline
 */

export * from './_table';

// Input
export * from './matrix';
export * from './master-catalogs';

// Derived tables
export * from './reference-tables';
export * from './picking-tables';

// Legacy order-entry output
export * from './legacy-system';
