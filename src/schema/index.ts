/**
 * Database schema definitions for the F3 Nation public schema.
 *
 * Only the tables the import tools read or write are declared here.
 */

// Reference tables (read-only for imports)
export * from './orgs';
export * from './locations';
export * from './events';
export * from './users';

// Written by the backblast import
export * from './event-instances';
export * from './attendance';
