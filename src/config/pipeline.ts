import Joi from 'joi';
import { PipelineCounts } from '../types/financial';

export type PersistenceDriver = 'postgres' | 'memory';

export interface PipelineConfig {
    defaults: PipelineCounts;
    seed: number | null;
    windowDays: number;
    currency: string;
    persistenceDriver: PersistenceDriver;
}

export const COUNT_LIMITS: PipelineCounts = {
    customers: 100000,
    merchants: 10000,
    transactions: 1000000
};

// the Mersenne randomizer keeps only the low 32 bits of a seed
export const MAX_SEED = 2 ** 32 - 1;

const envSchema = Joi.object({
    PIPELINE_CUSTOMERS: Joi.number().integer().min(0).max(COUNT_LIMITS.customers).default(500),
    PIPELINE_MERCHANTS: Joi.number().integer().min(0).max(COUNT_LIMITS.merchants).default(50),
    PIPELINE_TRANSACTIONS: Joi.number().integer().min(0).max(COUNT_LIMITS.transactions).default(5000),
    PIPELINE_SEED: Joi.number().integer().min(0).max(MAX_SEED).optional(),
    PIPELINE_WINDOW_DAYS: Joi.number().integer().min(1).max(3650).default(90),
    PIPELINE_CURRENCY: Joi.string().length(3).uppercase().default('USD'),
    PERSISTENCE_DRIVER: Joi.string().valid('postgres', 'memory').default('postgres')
}).unknown(true);

interface PipelineEnv {
    PIPELINE_CUSTOMERS: number;
    PIPELINE_MERCHANTS: number;
    PIPELINE_TRANSACTIONS: number;
    PIPELINE_SEED?: number;
    PIPELINE_WINDOW_DAYS: number;
    PIPELINE_CURRENCY: string;
    PERSISTENCE_DRIVER: PersistenceDriver;
}

export const loadPipelineConfig = (env: NodeJS.ProcessEnv = process.env): PipelineConfig => {
    const { error, value } = envSchema.validate(env, { convert: true });

    if (error) {
        throw new Error(`Invalid pipeline configuration: ${error.details[0].message}`);
    }

    const parsed: PipelineEnv = value;

    return {
        defaults: {
            customers: parsed.PIPELINE_CUSTOMERS,
            merchants: parsed.PIPELINE_MERCHANTS,
            transactions: parsed.PIPELINE_TRANSACTIONS
        },
        seed: parsed.PIPELINE_SEED ?? null,
        windowDays: parsed.PIPELINE_WINDOW_DAYS,
        currency: parsed.PIPELINE_CURRENCY,
        persistenceDriver: parsed.PERSISTENCE_DRIVER
    };
};
