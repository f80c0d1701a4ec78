export type RiskCategory = 'LOW' | 'MEDIUM' | 'HIGH';

export type MerchantStatus = 'ACTIVE' | 'INACTIVE' | 'SUSPENDED';

export type PaymentStatus = 'SUCCESS' | 'FAILED' | 'PENDING' | 'REFUNDED';

export type SettlementStatus = 'PENDING' | 'COMPLETED' | 'FAILED';

export interface Customer {
    id: string;
    name: string;
    email: string;
    phone: string;
    country: string;
    registrationDate: Date;
    creditScore: number;
    riskCategory: RiskCategory;
}

export interface Merchant {
    id: string;
    name: string;
    businessType: string;
    country: string;
    commissionRate: number;
    status: MerchantStatus;
}

export interface Payment {
    id: string;
    customerId: string;
    merchantId: string;
    amount: number;
    currency: string;
    paymentMethod: string;
    status: PaymentStatus;
    transactionDate: Date;
    processingTimeSeconds: number;
    failureReason: string | null;
    riskScore: number;
    isSuspicious: boolean;
}

export interface Settlement {
    id: string;
    merchantId: string;
    /** YYYY-MM-DD */
    settlementDate: string;
    /** YYYY-MM-DD */
    expectedSettlementDate: string;
    totalAmount: number;
    commissionAmount: number;
    netAmount: number;
    paymentCount: number;
    status: SettlementStatus;
    slaBreach: boolean;
}

export interface PipelineCounts {
    customers: number;
    merchants: number;
    transactions: number;
}

export interface PipelineDataset {
    customers: Customer[];
    merchants: Merchant[];
    payments: Payment[];
    settlements: Settlement[];
}

export interface EntityCounts {
    customers: number;
    merchants: number;
    payments: number;
    settlements: number;
}

export interface PipelineRunSummary {
    runId: string;
    seed: number | null;
    generated: EntityCounts;
    inserted: EntityCounts;
    durationMs: number;
}
