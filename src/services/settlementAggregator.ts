import { logger } from '../config/logger';
import { ReferentialIntegrityError } from '../middleware/errorHandler';
import { Merchant, Payment, Settlement, SettlementStatus } from '../types/financial';
import { formatEntityId } from './entityGenerator';
import { RandomSource } from './randomSource';
import { WeightedSampler } from './weightedSampler';

export const SLA_DAYS = 2;
export const SETTLEMENT_DELAY_RANGE = { min: 1, max: 5 } as const;

export const SETTLEMENT_STATUS_WEIGHTS: Readonly<Record<SettlementStatus, number>> = {
    COMPLETED: 0.90,
    PENDING: 0.08,
    FAILED: 0.02
};

interface SettlementGroup {
    merchant: Merchant;
    day: string;
    totalCents: number;
    paymentCount: number;
}

/** UTC calendar day, YYYY-MM-DD. */
export const toCalendarDay = (timestamp: Date): string => timestamp.toISOString().slice(0, 10);

export const addDays = (day: string, days: number): string => {
    const date = new Date(`${day}T00:00:00.000Z`);
    date.setUTCDate(date.getUTCDate() + days);
    return toCalendarDay(date);
};

export const toCents = (amount: number): number => Math.round(amount * 100);

/**
 * Splits a gross amount into commission and net, in cents. The net is derived
 * from the rounded commission so the two always add back to the gross.
 */
export const splitCommission = (totalCents: number, commissionRate: number) => {
    const commissionCents = Math.round((totalCents * commissionRate) / 100);
    return {
        commissionCents,
        netCents: totalCents - commissionCents
    };
};

export class SettlementAggregator {
    private readonly statusSampler = WeightedSampler.fromTable(SETTLEMENT_STATUS_WEIGHTS);

    constructor(private readonly random: RandomSource) {}

    aggregate(payments: Payment[], merchants: Merchant[]): Settlement[] {
        const merchantsById = new Map(merchants.map(merchant => [merchant.id, merchant]));
        const groups = new Map<string, SettlementGroup>();

        for (const payment of payments) {
            if (payment.status != 'SUCCESS') {
                continue;
            }

            const merchant = merchantsById.get(payment.merchantId);
            if (!merchant) {
                throw new ReferentialIntegrityError(
                    'settlement',
                    payment.id,
                    payment.merchantId,
                    'Payment references an unknown merchant'
                );
            }

            const day = toCalendarDay(payment.transactionDate);
            const key = `${merchant.id}|${day}`;
            const group = groups.get(key);

            if (group) {
                group.totalCents += toCents(payment.amount);
                group.paymentCount += 1;
            } else {
                groups.set(key, { merchant, day, totalCents: toCents(payment.amount), paymentCount: 1 });
            }
        }

        // (merchantId, day) ascending keeps seeded runs reproducible
        const ordered = [...groups.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
        const settlements = ordered.map(([, group], index) => this.settle(group, index + 1));

        logger.debug(`Aggregated ${settlements.length} settlements from ${payments.length} payments`);
        return settlements;
    }

    private settle(group: SettlementGroup, sequence: number): Settlement {
        const { commissionCents, netCents } = splitCommission(group.totalCents, group.merchant.commissionRate);

        const expectedSettlementDate = addDays(group.day, SLA_DAYS);
        const delay = this.random.int(SETTLEMENT_DELAY_RANGE.min, SETTLEMENT_DELAY_RANGE.max);
        const settlementDate = addDays(group.day, delay);

        return {
            id: formatEntityId('SETTLE', sequence, 5),
            merchantId: group.merchant.id,
            settlementDate,
            expectedSettlementDate,
            totalAmount: group.totalCents / 100,
            commissionAmount: commissionCents / 100,
            netAmount: netCents / 100,
            paymentCount: group.paymentCount,
            status: this.statusSampler.sample(this.random),
            slaBreach: settlementDate > expectedSettlementDate
        };
    }
}
