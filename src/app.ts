import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { logger } from './config/logger';
import { PipelineConfig } from './config/pipeline';
import { NotFoundError, errorHandler } from './middleware/errorHandler';
import { createApiRouter } from './routes';
import { HealthCheckResponse } from './types/api';
import { PersistenceSink } from './types/persistence';

export interface AppDependencies {
    sink: PersistenceSink;
    config: PipelineConfig;
}

export const createApp = ({ sink, config }: AppDependencies): Express => {
    const app = express();

    app.use(helmet({
        contentSecurityPolicy: false
    }));

    app.use(cors({
        origin: process.env.NODE_ENV == 'production' ? false : true,
        credentials: true
    }));

    app.use(express.json({ limit: '1mb' }));

    app.use((req, res, next) => {
        logger.info(`${req.method} ${req.path}`, {
            ip: req.ip,
            userAgent: req.get('User-Agent')
        });
        next();
    });

    app.use('/api', createApiRouter(sink, config));

    app.get('/health', (req, res) => {
        const health: HealthCheckResponse = {
            status: 'OK',
            timestamp: new Date().toISOString(),
            uptime: process.uptime(),
            persistence: config.persistenceDriver,
            version: process.env.npm_package_version || '1.0.0'
        };
        res.json(health);
    });

    app.use((req, res, next) => {
        next(new NotFoundError(`Endpoint not found: ${req.method} ${req.originalUrl}`));
    });

    app.use(errorHandler);

    return app;
};
