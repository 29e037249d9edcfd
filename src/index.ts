/**
 * wiki-sync library entry point
 *
 * The CLI lives in ./cli.ts; importing this module has no side effects.
 */

export * from './models';
export * from './wiki';
export * from './sync';
export * from './knowledge';
export * from './utils';
