/**
 * Shared types, constants and schemas for idlewipe
 *
 * @packageDocumentation
 */

export * from './constants';
export * from './schemas';
export * from './types';
