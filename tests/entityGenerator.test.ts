import { BUSINESS_TYPES, COUNTRIES } from '../src/config/catalogs';
import { PipelineConfigurationError } from '../src/middleware/errorHandler';
import {
    EntityGenerator,
    MERCHANT_STATUS_WEIGHTS,
    categorizeCreditScore,
    formatEntityId
} from '../src/services/entityGenerator';
import { RandomSource } from '../src/services/randomSource';
import { WeightedSampler } from '../src/services/weightedSampler';

const NOW = new Date('2026-06-15T12:00:00.000Z');

describe('EntityGenerator', () => {
    describe('categorizeCreditScore', () => {
        it.each<[number, string]>([
            [850, 'LOW'],
            [720, 'LOW'],
            [719, 'MEDIUM'],
            [600, 'MEDIUM'],
            [599, 'HIGH'],
            [300, 'HIGH']
        ])('maps %i to %s', (score, category) => {
            expect(categorizeCreditScore(score)).toBe(category);
        });
    });

    it('pads entity ids to a fixed width', () => {
        expect(formatEntityId('CUST', 7, 5)).toBe('CUST00007');
        expect(formatEntityId('MERCH', 12, 4)).toBe('MERCH0012');
    });

    describe('generateCustomers', () => {
        const generator = new EntityGenerator(new RandomSource(11), { now: NOW });
        const customers = generator.generateCustomers(300);

        it('produces sequential unique ids', () => {
            expect(customers).toHaveLength(300);
            expect(customers[0].id).toBe('CUST00001');
            expect(customers[299].id).toBe('CUST00300');
            expect(new Set(customers.map(c => c.id)).size).toBe(300);
        });

        it('keeps credit scores in range and derives the risk category from them', () => {
            for (const customer of customers) {
                expect(Number.isInteger(customer.creditScore)).toBe(true);
                expect(customer.creditScore).toBeGreaterThanOrEqual(300);
                expect(customer.creditScore).toBeLessThanOrEqual(850);
                expect(customer.riskCategory).toBe(categorizeCreditScore(customer.creditScore));
            }
        });

        it('gives every customer a distinct email and a short phone number', () => {
            expect(new Set(customers.map(c => c.email)).size).toBe(300);
            for (const customer of customers) {
                expect(customer.phone.length).toBeLessThanOrEqual(20);
                expect(COUNTRIES).toContain(customer.country);
            }
        });

        it('registers customers within the two years before generation', () => {
            const from = new Date('2024-06-15T12:00:00.000Z').getTime();
            for (const customer of customers) {
                expect(customer.registrationDate.getTime()).toBeGreaterThanOrEqual(from);
                expect(customer.registrationDate.getTime()).toBeLessThanOrEqual(NOW.getTime());
            }
        });
    });

    describe('generateMerchants', () => {
        const generator = new EntityGenerator(new RandomSource(12), { now: NOW });
        const merchants = generator.generateMerchants(500);

        it('rounds commission rates to two decimals within [1.5, 5.0]', () => {
            for (const merchant of merchants) {
                expect(merchant.commissionRate).toBeGreaterThanOrEqual(1.5);
                expect(merchant.commissionRate).toBeLessThanOrEqual(5.0);
                expect(Math.round(merchant.commissionRate * 100) / 100).toBe(merchant.commissionRate);
            }
        });

        it('draws statuses and business types from their catalogs', () => {
            expect(merchants[0].id).toBe('MERCH0001');
            for (const merchant of merchants) {
                expect(['ACTIVE', 'INACTIVE', 'SUSPENDED']).toContain(merchant.status);
                expect(BUSINESS_TYPES).toContain(merchant.businessType);
            }
        });

        it('makes most merchants active', () => {
            const active = merchants.filter(m => m.status == 'ACTIVE').length;
            expect(active / merchants.length).toBeGreaterThan(0.75);
            expect(active / merchants.length).toBeLessThan(0.95);
        });
    });

    it('weights merchant statuses 85/10/5', () => {
        const statuses = WeightedSampler.fromTable(MERCHANT_STATUS_WEIGHTS);

        expect(statuses.probabilityOf('ACTIVE')).toBeCloseTo(0.85, 10);
        expect(statuses.probabilityOf('INACTIVE')).toBeCloseTo(0.10, 10);
        expect(statuses.probabilityOf('SUSPENDED')).toBeCloseTo(0.05, 10);
    });

    it('draws inactive and suspended merchants at their configured rates', () => {
        const merchants = new EntityGenerator(new RandomSource(13), { now: NOW }).generateMerchants(5000);
        const share = (status: string) => merchants.filter(m => m.status == status).length / merchants.length;

        expect(share('INACTIVE')).toBeGreaterThan(0.08);
        expect(share('INACTIVE')).toBeLessThan(0.12);
        expect(share('SUSPENDED')).toBeGreaterThan(0.035);
        expect(share('SUSPENDED')).toBeLessThan(0.065);
    });

    it('returns empty populations for a count of zero', () => {
        const generator = new EntityGenerator(new RandomSource(1), { now: NOW });

        expect(generator.generateCustomers(0)).toEqual([]);
        expect(generator.generateMerchants(0)).toEqual([]);
    });

    it('rejects negative or fractional counts', () => {
        const generator = new EntityGenerator(new RandomSource(1), { now: NOW });

        expect(() => generator.generateCustomers(-1)).toThrow(PipelineConfigurationError);
        expect(() => generator.generateMerchants(2.5)).toThrow('[entities] Merchant count must be a non-negative integer, got 2.5');
    });
});
