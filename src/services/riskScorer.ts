import { RiskCategory } from '../types/financial';
import { roundTo2 } from './randomSource';

export const RISK_SCORE_MAX = 100;
export const LARGE_AMOUNT_THRESHOLD = 5000;
export const LARGE_AMOUNT_PENALTY = 30;
export const HIGH_RISK_CUSTOMER_PENALTY = 20;
export const SUSPICIOUS_SCORE_THRESHOLD = 75;
export const SUSPICIOUS_AMOUNT_THRESHOLD = 10000;

/**
 * Adds the amount and customer-tier penalties to a base draw in [0, 100].
 * The score is clamped after each addition.
 */
export const scoreRisk = (base: number, amount: number, riskCategory: RiskCategory): number => {
    let score = base;

    if (amount > LARGE_AMOUNT_THRESHOLD) {
        score = Math.min(RISK_SCORE_MAX, score + LARGE_AMOUNT_PENALTY);
    }

    if (riskCategory == 'HIGH') {
        score = Math.min(RISK_SCORE_MAX, score + HIGH_RISK_CUSTOMER_PENALTY);
    }

    return roundTo2(score);
};

export const isSuspicious = (riskScore: number, amount: number): boolean =>
    riskScore > SUSPICIOUS_SCORE_THRESHOLD || amount > SUSPICIOUS_AMOUNT_THRESHOLD;
