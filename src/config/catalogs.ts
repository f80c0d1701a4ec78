export const PAYMENT_METHODS = [
    'CREDIT_CARD',
    'DEBIT_CARD',
    'BANK_TRANSFER',
    'PAYPAL',
    'CRYPTO',
    'WALLET'
] as const;

export const BUSINESS_TYPES = [
    'E-COMMERCE',
    'RETAIL',
    'SUBSCRIPTION',
    'MARKETPLACE',
    'FINANCIAL_SERVICES',
    'TRAVEL'
] as const;

export const COUNTRIES = [
    'USA',
    'UK',
    'CANADA',
    'GERMANY',
    'FRANCE',
    'INDIA',
    'SINGAPORE',
    'AUSTRALIA'
] as const;

export const FAILURE_REASONS = [
    'Insufficient funds',
    'Card declined',
    'Authentication failed',
    'Network timeout',
    'Invalid card details',
    'Fraud detection triggered',
    'Daily limit exceeded'
] as const;
