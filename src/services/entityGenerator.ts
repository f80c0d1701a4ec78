import { BUSINESS_TYPES, COUNTRIES } from '../config/catalogs';
import { logger } from '../config/logger';
import { PipelineConfigurationError } from '../middleware/errorHandler';
import { Customer, Merchant, MerchantStatus, RiskCategory } from '../types/financial';
import { RandomSource, roundTo2 } from './randomSource';
import { WeightedSampler } from './weightedSampler';

export const CREDIT_SCORE_MIN = 300;
export const CREDIT_SCORE_MAX = 850;

const COMMISSION_RATE_MIN = 1.5;
const COMMISSION_RATE_MAX = 5.0;
const REGISTRATION_LOOKBACK_YEARS = 2;

export const MERCHANT_STATUS_WEIGHTS: Readonly<Record<MerchantStatus, number>> = {
    ACTIVE: 0.85,
    INACTIVE: 0.10,
    SUSPENDED: 0.05
};

export const categorizeCreditScore = (creditScore: number): RiskCategory => {
    if (creditScore >= 720) {
        return 'LOW';
    }
    if (creditScore >= 600) {
        return 'MEDIUM';
    }
    return 'HIGH';
};

export const formatEntityId = (prefix: string, sequence: number, width: number): string =>
    `${prefix}${String(sequence).padStart(width, '0')}`;

export const assertPopulationSize = (stage: 'entities' | 'transactions', label: string, count: number): void => {
    if (!Number.isInteger(count) || count < 0) {
        throw new PipelineConfigurationError(stage, `${label} must be a non-negative integer, got ${count}`);
    }
};

export interface EntityGeneratorOptions {
    now?: Date;
}

export class EntityGenerator {
    private readonly merchantStatus = WeightedSampler.fromTable(MERCHANT_STATUS_WEIGHTS);
    private readonly now: Date;

    constructor(private readonly random: RandomSource, options: EntityGeneratorOptions = {}) {
        this.now = options.now ?? new Date();
    }

    generateCustomers(count: number): Customer[] {
        assertPopulationSize('entities', 'Customer count', count);

        const { faker } = this.random;
        const registrationFrom = new Date(this.now);
        registrationFrom.setUTCFullYear(registrationFrom.getUTCFullYear() - REGISTRATION_LOOKBACK_YEARS);

        const seenEmails = new Set<string>();
        const customers: Customer[] = [];

        for (let i = 0; i < count; i++) {
            const id = formatEntityId('CUST', i + 1, 5);
            const firstName = faker.person.firstName();
            const lastName = faker.person.lastName();
            const creditScore = this.random.int(CREDIT_SCORE_MIN, CREDIT_SCORE_MAX);

            let email = faker.internet.email({ firstName, lastName }).toLowerCase();
            if (seenEmails.has(email)) {
                email = `${id.toLowerCase()}.${email}`;
            }
            seenEmails.add(email);

            customers.push({
                id,
                name: `${firstName} ${lastName}`,
                email,
                phone: faker.phone.number().slice(0, 20),
                country: this.random.pick(COUNTRIES),
                registrationDate: faker.date.between({ from: registrationFrom, to: this.now }),
                creditScore,
                riskCategory: categorizeCreditScore(creditScore)
            });
        }

        logger.debug(`Generated ${customers.length} customers`);
        return customers;
    }

    generateMerchants(count: number): Merchant[] {
        assertPopulationSize('entities', 'Merchant count', count);

        const merchants: Merchant[] = [];

        for (let i = 0; i < count; i++) {
            merchants.push({
                id: formatEntityId('MERCH', i + 1, 4),
                name: this.random.faker.company.name(),
                businessType: this.random.pick(BUSINESS_TYPES),
                country: this.random.pick(COUNTRIES),
                commissionRate: roundTo2(this.random.uniform(COMMISSION_RATE_MIN, COMMISSION_RATE_MAX)),
                status: this.merchantStatus.sample(this.random)
            });
        }

        logger.debug(`Generated ${merchants.length} merchants`);
        return merchants;
    }
}
