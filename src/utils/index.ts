/**
 * Utilities module
 */

export * from './logger';
export * from './config';
export * from './fileUtils';
export { generateId } from './ids';
