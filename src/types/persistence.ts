import { Customer, Merchant, Payment, Settlement } from './financial';

export interface EntityRecords {
    customers: Customer;
    merchants: Merchant;
    payments: Payment;
    settlements: Settlement;
}

export type EntityKind = keyof EntityRecords;

/**
 * Storage boundary the pipeline loads into.
 *
 * `upsertIgnore` inserts each record under its natural id and silently skips
 * ids that already exist. Resolves with the number of rows actually inserted.
 */
export interface PersistenceSink {
    upsertIgnore<K extends EntityKind>(kind: K, batch: EntityRecords[K][]): Promise<number>;
}
