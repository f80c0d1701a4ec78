import { FAILURE_REASONS, PAYMENT_METHODS } from '../config/catalogs';
import { logger } from '../config/logger';
import { PipelineConfigurationError } from '../middleware/errorHandler';
import { Customer, Merchant, Payment, PaymentStatus, RiskCategory } from '../types/financial';
import { assertPopulationSize, formatEntityId } from './entityGenerator';
import { RandomSource, roundTo2 } from './randomSource';
import { isSuspicious, scoreRisk } from './riskScorer';
import { WeightedSampler } from './weightedSampler';

const MS_PER_MINUTE = 60 * 1000;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;
const MS_PER_DAY = 24 * MS_PER_HOUR;

export const OUTLIER_PROBABILITY = 0.05;
export const OUTLIER_AMOUNT_RANGE = { min: 5000, max: 50000 } as const;
export const REGULAR_AMOUNT_RANGE = { min: 10, max: 2000 } as const;
export const PROCESSING_TIME_RANGE = { min: 1, max: 30 } as const;

// Riskier customers fail and refund more often.
export const STATUS_WEIGHTS_BY_RISK: Readonly<Record<RiskCategory, Readonly<Record<PaymentStatus, number>>>> = {
    HIGH: { SUCCESS: 0.65, FAILED: 0.25, PENDING: 0.08, REFUNDED: 0.02 },
    MEDIUM: { SUCCESS: 0.85, FAILED: 0.10, PENDING: 0.04, REFUNDED: 0.01 },
    LOW: { SUCCESS: 0.95, FAILED: 0.03, PENDING: 0.015, REFUNDED: 0.005 }
};

export interface TransactionGeneratorOptions {
    now?: Date;
    windowDays?: number;
    currency?: string;
}

export class TransactionGenerator {
    private readonly statusSamplers: Record<RiskCategory, WeightedSampler<PaymentStatus>> = {
        HIGH: WeightedSampler.fromTable(STATUS_WEIGHTS_BY_RISK.HIGH),
        MEDIUM: WeightedSampler.fromTable(STATUS_WEIGHTS_BY_RISK.MEDIUM),
        LOW: WeightedSampler.fromTable(STATUS_WEIGHTS_BY_RISK.LOW)
    };
    private readonly now: Date;
    private readonly windowDays: number;
    private readonly currency: string;

    constructor(private readonly random: RandomSource, options: TransactionGeneratorOptions = {}) {
        this.now = options.now ?? new Date();
        this.windowDays = options.windowDays ?? 90;
        this.currency = options.currency ?? 'USD';

        if (!Number.isInteger(this.windowDays) || this.windowDays < 1) {
            throw new PipelineConfigurationError('transactions', `windowDays must be a positive integer, got ${this.windowDays}`);
        }
    }

    generatePayments(customers: Customer[], merchants: Merchant[], count: number): Payment[] {
        assertPopulationSize('transactions', 'Transaction count', count);

        if (count > 0 && (customers.length == 0 || merchants.length == 0)) {
            throw new PipelineConfigurationError(
                'transactions',
                `Cannot sample ${count} payments from ${customers.length} customers and ${merchants.length} merchants`
            );
        }

        const payments: Payment[] = [];

        for (let i = 0; i < count; i++) {
            payments.push(this.generatePayment(i + 1, customers, merchants));

            if ((i + 1) % 1000 == 0) {
                logger.debug(`Generated ${i + 1}/${count} payments`);
            }
        }

        return payments;
    }

    private generatePayment(sequence: number, customers: Customer[], merchants: Merchant[]): Payment {
        const customer = this.random.pick(customers);
        const merchant = this.random.pick(merchants);

        const status = this.statusSamplers[customer.riskCategory].sample(this.random);
        const amount = this.drawAmount();
        const riskScore = scoreRisk(this.random.uniform(0, 100), amount, customer.riskCategory);

        return {
            id: formatEntityId('PAY', sequence, 6),
            customerId: customer.id,
            merchantId: merchant.id,
            amount,
            currency: this.currency,
            paymentMethod: this.random.pick(PAYMENT_METHODS),
            status,
            transactionDate: this.drawTransactionDate(),
            processingTimeSeconds: this.random.int(PROCESSING_TIME_RANGE.min, PROCESSING_TIME_RANGE.max),
            failureReason: status == 'FAILED' ? this.random.pick(FAILURE_REASONS) : null,
            riskScore,
            isSuspicious: isSuspicious(riskScore, amount)
        };
    }

    private drawAmount(): number {
        const range = this.random.chance(OUTLIER_PROBABILITY) ? OUTLIER_AMOUNT_RANGE : REGULAR_AMOUNT_RANGE;
        return roundTo2(this.random.uniform(range.min, range.max));
    }

    /** Day, hour and minute are drawn independently inside the trailing window. */
    private drawTransactionDate(): Date {
        const windowStart = this.now.getTime() - this.windowDays * MS_PER_DAY;
        const offset =
            this.random.int(0, this.windowDays - 1) * MS_PER_DAY +
            this.random.int(0, 23) * MS_PER_HOUR +
            this.random.int(0, 59) * MS_PER_MINUTE;

        return new Date(windowStart + offset);
    }
}
