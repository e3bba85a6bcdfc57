import { v7 as uuidv7 } from 'uuid';

/**
 * Produces a new entity id. Successive ids from one generator sort
 * lexicographically in creation order.
 */
export type IdGenerator = () => string;

/**
 * UUIDv7 ids: millisecond timestamp prefix with a per-process sequence, so
 * ids minted within the same millisecond still increase.
 */
export const newId: IdGenerator = () => uuidv7();

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
