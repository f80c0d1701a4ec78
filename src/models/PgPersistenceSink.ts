import { Pool } from 'pg';
import { logger } from '../config/logger';
import { DatabaseError } from '../middleware/errorHandler';
import { EntityKind, EntityRecords, PersistenceSink } from '../types/persistence';

interface TableSpec<T> {
    table: string;
    primaryKey: string;
    columns: readonly string[];
    toRow(record: T): unknown[];
}

const PG_MAX_BIND_PARAMETERS = 65535;
const MAX_ROWS_PER_STATEMENT = 1000;

export const TABLES: { [K in EntityKind]: TableSpec<EntityRecords[K]> } = {
    customers: {
        table: 'customers',
        primaryKey: 'customer_id',
        columns: [
            'customer_id', 'customer_name', 'email', 'phone', 'country',
            'registration_date', 'credit_score', 'risk_category'
        ],
        toRow: c => [c.id, c.name, c.email, c.phone, c.country, c.registrationDate, c.creditScore, c.riskCategory]
    },
    merchants: {
        table: 'merchants',
        primaryKey: 'merchant_id',
        columns: ['merchant_id', 'merchant_name', 'business_type', 'country', 'commission_rate', 'status'],
        toRow: m => [m.id, m.name, m.businessType, m.country, m.commissionRate, m.status]
    },
    payments: {
        table: 'payments',
        primaryKey: 'payment_id',
        columns: [
            'payment_id', 'customer_id', 'merchant_id', 'amount', 'currency',
            'payment_method', 'payment_status', 'transaction_date',
            'processing_time_seconds', 'failure_reason', 'risk_score', 'is_suspicious'
        ],
        toRow: p => [
            p.id, p.customerId, p.merchantId, p.amount, p.currency,
            p.paymentMethod, p.status, p.transactionDate,
            p.processingTimeSeconds, p.failureReason, p.riskScore, p.isSuspicious
        ]
    },
    settlements: {
        table: 'settlements',
        primaryKey: 'settlement_id',
        columns: [
            'settlement_id', 'merchant_id', 'settlement_date',
            'total_amount', 'commission_amount', 'net_amount',
            'payment_count', 'status', 'sla_breach', 'expected_settlement_date'
        ],
        toRow: s => [
            s.id, s.merchantId, s.settlementDate,
            s.totalAmount, s.commissionAmount, s.netAmount,
            s.paymentCount, s.status, s.slaBreach, s.expectedSettlementDate
        ]
    }
};

export const buildInsertIgnore = <T>(spec: TableSpec<T>, records: T[]): { text: string; values: unknown[] } => {
    const values: unknown[] = [];
    const tuples = records.map(record => {
        const row = spec.toRow(record);
        const placeholders = row.map(value => {
            values.push(value);
            return `$${values.length}`;
        });
        return `(${placeholders.join(', ')})`;
    });

    const text =
        `INSERT INTO ${spec.table} (${spec.columns.join(', ')}) VALUES ${tuples.join(', ')} ` +
        `ON CONFLICT (${spec.primaryKey}) DO NOTHING`;

    return { text, values };
};

/**
 * Loads each entity batch inside one transaction with multi-row
 * `INSERT ... ON CONFLICT DO NOTHING` statements. A failing batch is rolled
 * back as a whole.
 */
export class PgPersistenceSink implements PersistenceSink {
    constructor(private readonly pool: Pool) {}

    async upsertIgnore<K extends EntityKind>(kind: K, batch: EntityRecords[K][]): Promise<number> {
        if (batch.length == 0) {
            return 0;
        }

        const spec: TableSpec<EntityRecords[K]> = TABLES[kind];
        const rowsPerStatement = Math.min(
            MAX_ROWS_PER_STATEMENT,
            Math.floor(PG_MAX_BIND_PARAMETERS / spec.columns.length)
        );

        const client = await this.pool.connect();
        let releaseError: Error | undefined;
        try {
            await client.query('BEGIN');

            let inserted = 0;
            for (let start = 0; start < batch.length; start += rowsPerStatement) {
                const { text, values } = buildInsertIgnore(spec, batch.slice(start, start + rowsPerStatement));
                const result = await client.query(text, values);
                inserted += result.rowCount ?? 0;
            }

            await client.query('COMMIT');

            logger.info(`Loaded ${inserted}/${batch.length} ${kind}`, {
                skipped: batch.length - inserted
            });
            return inserted;
        } catch (error) {
            releaseError = error instanceof Error ? error : new Error(String(error));
            try {
                await client.query('ROLLBACK');
            } catch (rollbackError) {
                logger.error(`Rollback failed while loading ${kind}`, rollbackError);
            }
            logger.error(`Error loading ${kind}`, error);
            throw new DatabaseError(`Failed to load ${batch.length} ${kind}`, { cause: error });
        } finally {
            // an errored client is destroyed instead of returned to the pool
            client.release(releaseError);
        }
    }
}
