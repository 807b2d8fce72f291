/**
 * @module protocol
 *
 * Wire model, codec, error taxonomy and request correlation.
 */

export * from './channel';
export * from './codec';
export * from './correlator';
export * from './errors';
export * from './types';
