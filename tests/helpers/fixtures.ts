import { Randomizer } from '@faker-js/faker';
import { RandomSource } from '../../src/services/randomSource';
import { Customer, Merchant, Payment, RiskCategory } from '../../src/types/financial';

/** RandomSource whose draws cycle through the given values. */
export const scriptedRandom = (values: number[]): RandomSource => {
    let index = 0;
    const randomizer: Randomizer = {
        next: () => values[index++ % values.length],
        seed: () => undefined
    };
    return new RandomSource(null, randomizer);
};

export const makeCustomer = (id: string, riskCategory: RiskCategory = 'LOW'): Customer => ({
    id,
    name: 'Test Customer',
    email: `${id.toLowerCase()}@example.com`,
    phone: '555-0100',
    country: 'USA',
    registrationDate: new Date('2025-01-01T00:00:00.000Z'),
    creditScore: riskCategory == 'LOW' ? 780 : riskCategory == 'MEDIUM' ? 650 : 500,
    riskCategory
});

export const makeMerchant = (id: string, commissionRate = 2.5): Merchant => ({
    id,
    name: 'Test Merchant',
    businessType: 'RETAIL',
    country: 'USA',
    commissionRate,
    status: 'ACTIVE'
});

export const makePayment = (overrides: Partial<Payment> & Pick<Payment, 'id' | 'merchantId'>): Payment => ({
    customerId: 'CUST00001',
    amount: 100,
    currency: 'USD',
    paymentMethod: 'CREDIT_CARD',
    status: 'SUCCESS',
    transactionDate: new Date('2026-03-01T12:00:00.000Z'),
    processingTimeSeconds: 5,
    failureReason: null,
    riskScore: 10,
    isSuspicious: false,
    ...overrides
});
