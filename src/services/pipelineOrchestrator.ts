import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger';
import { PipelineConfigurationError, ReferentialIntegrityError } from '../middleware/errorHandler';
import {
    Customer,
    EntityCounts,
    Merchant,
    Payment,
    PipelineCounts,
    PipelineDataset,
    PipelineRunSummary
} from '../types/financial';
import { PersistenceSink } from '../types/persistence';
import { EntityGenerator, assertPopulationSize } from './entityGenerator';
import { RandomSource } from './randomSource';
import { SettlementAggregator } from './settlementAggregator';
import { TransactionGenerator } from './transactionGenerator';

export interface PipelineOrchestratorOptions {
    random?: RandomSource;
    seed?: number | null;
    now?: Date;
    windowDays?: number;
    currency?: string;
}

export const countDataset = (dataset: PipelineDataset): EntityCounts => ({
    customers: dataset.customers.length,
    merchants: dataset.merchants.length,
    payments: dataset.payments.length,
    settlements: dataset.settlements.length
});

export const validateCounts = (counts: PipelineCounts): void => {
    assertPopulationSize('entities', 'Customer count', counts.customers);
    assertPopulationSize('entities', 'Merchant count', counts.merchants);
    assertPopulationSize('transactions', 'Transaction count', counts.transactions);

    if (counts.transactions > 0 && (counts.customers == 0 || counts.merchants == 0)) {
        throw new PipelineConfigurationError(
            'transactions',
            `${counts.transactions} transactions requested but customers=${counts.customers}, merchants=${counts.merchants}`
        );
    }
};

export const assertPaymentReferences = (payments: Payment[], customers: Customer[], merchants: Merchant[]): void => {
    const customerIds = new Set(customers.map(c => c.id));
    const merchantIds = new Set(merchants.map(m => m.id));

    for (const payment of payments) {
        if (!customerIds.has(payment.customerId)) {
            throw new ReferentialIntegrityError('transactions', payment.id, payment.customerId, 'Payment references an unknown customer');
        }
        if (!merchantIds.has(payment.merchantId)) {
            throw new ReferentialIntegrityError('transactions', payment.id, payment.merchantId, 'Payment references an unknown merchant');
        }
    }
};

/**
 * Runs entities -> transactions -> settlements on one random stream, then
 * loads the result into the sink in foreign-key order.
 */
export class PipelineOrchestrator {
    private readonly random: RandomSource;
    private readonly entities: EntityGenerator;
    private readonly transactions: TransactionGenerator;
    private readonly settlements: SettlementAggregator;

    constructor(private readonly sink: PersistenceSink, options: PipelineOrchestratorOptions = {}) {
        this.random = options.random ?? new RandomSource(options.seed ?? null);

        const now = options.now ?? new Date();
        this.entities = new EntityGenerator(this.random, { now });
        this.transactions = new TransactionGenerator(this.random, {
            now,
            windowDays: options.windowDays,
            currency: options.currency
        });
        this.settlements = new SettlementAggregator(this.random);
    }

    generate(counts: PipelineCounts): PipelineDataset {
        validateCounts(counts);

        logger.info('Generating customer data...');
        const customers = this.entities.generateCustomers(counts.customers);

        logger.info('Generating merchant data...');
        const merchants = this.entities.generateMerchants(counts.merchants);

        logger.info('Generating payment data...');
        const payments = this.transactions.generatePayments(customers, merchants, counts.transactions);
        assertPaymentReferences(payments, customers, merchants);

        logger.info('Generating settlement data...');
        const settlements = this.settlements.aggregate(payments, merchants);

        return { customers, merchants, payments, settlements };
    }

    async load(dataset: PipelineDataset): Promise<EntityCounts> {
        const customers = await this.sink.upsertIgnore('customers', dataset.customers);
        const merchants = await this.sink.upsertIgnore('merchants', dataset.merchants);
        const payments = await this.sink.upsertIgnore('payments', dataset.payments);
        const settlements = await this.sink.upsertIgnore('settlements', dataset.settlements);

        return { customers, merchants, payments, settlements };
    }

    async run(counts: PipelineCounts): Promise<PipelineRunSummary> {
        const runId = uuidv4();
        const startTime = Date.now();

        logger.info('Starting ETL pipeline...', { runId, seed: this.random.seed, ...counts });

        const dataset = this.generate(counts);
        const generated = countDataset(dataset);
        const inserted = await this.load(dataset);
        const durationMs = Date.now() - startTime;

        logger.info('ETL pipeline completed successfully', { runId, generated, inserted, durationMs });

        return {
            runId,
            seed: this.random.seed,
            generated,
            inserted,
            durationMs
        };
    }
}
