import { Pool, PoolConfig } from 'pg';
import { logger } from './logger';

export const dbConfig: PoolConfig = {
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432'),
    database: process.env.DB_NAME || 'financial_analytics',
    user: process.env.DB_USER || 'postgres',
    password: process.env.DB_PASSWORD || 'postgres',

    max: parseInt(process.env.DB_POOL_MAX || '10'),
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
    application_name: 'payment-dataset-generator'
};

let pool: Pool | null = null;

export const getPool = (): Pool => {
    if (pool) {
        return pool;
    }

    pool = new Pool(dbConfig);

    pool.on('connect', () => {
        logger.debug('New PostgreSQL client connected');
    });

    pool.on('error', (err) => {
        logger.error('PostgreSQL client error:', err);
    });

    return pool;
};

export const testConnection = async (): Promise<boolean> => {
    try {
        const client = await getPool().connect();
        const result = await client.query('SELECT NOW()');

        client.release();

        logger.info('Database connection successful', result.rows[0]);
        return true;
    } catch (error) {
        logger.error('Database connection failed', error);
        return false;
    }
};

export const closePool = async (): Promise<void> => {
    if (!pool) {
        return;
    }

    await pool.end();
    pool = null;
    logger.info('Database pool closed');
};
