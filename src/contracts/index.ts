/**
 * Contracts Module
 *
 * Shared vocabularies and the versioned schemas of every persisted artifact.
 */

export * from './types';
export * from './schemas';
