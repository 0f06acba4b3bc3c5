/**
 * Type definitions index - exports all types used throughout PairStream
 */

export type * from './pairstream.js';
