/**
 * Staking Module
 *
 * Single-asset staking ledger with tiered, time-based interest.
 */

export * from './address';
export * from './errors';
export * from './interest';
export * from './ledger';
export * from './access';
export * from './guard';
export * from './events';
export * from './pool';
