/**
 * Index file for wiki-sync models
 */

// Configuration models
export * from './Config';

// Operation outcomes and summaries
export * from './SyncModels';
