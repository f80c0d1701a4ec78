import { logger } from '../config/logger';
import { EntityKind, EntityRecords, PersistenceSink } from '../types/persistence';

export class InMemoryPersistenceSink implements PersistenceSink {
    private readonly stores: { [K in EntityKind]: Map<string, EntityRecords[K]> } = {
        customers: new Map(),
        merchants: new Map(),
        payments: new Map(),
        settlements: new Map()
    };

    async upsertIgnore<K extends EntityKind>(kind: K, batch: EntityRecords[K][]): Promise<number> {
        const store: Map<string, EntityRecords[K]> = this.stores[kind];
        let inserted = 0;

        for (const record of batch) {
            if (!store.has(record.id)) {
                store.set(record.id, record);
                inserted++;
            }
        }

        logger.debug(`Stored ${inserted}/${batch.length} ${kind} in memory`);
        return inserted;
    }

    count(kind: EntityKind): number {
        return this.stores[kind].size;
    }
}
