/**
 * Socket Module Types
 */

export * from './socket';
