import { Router } from 'express';
import { PipelineConfig } from '../config/pipeline';
import { PersistenceSink } from '../types/persistence';
import { createEtlRouter } from './etl';

export const createApiRouter = (sink: PersistenceSink, config: PipelineConfig): Router => {
    const router = Router();

    router.use('/etl', createEtlRouter(sink, config));

    router.get('/', (req, res) => {
        res.json({
            name: 'Payment Dataset Generator API',
            version: '1.0.0',
            description: 'Synthetic customers, merchants, payments and merchant settlements',
            endpoints: {
                'POST /api/etl/run': 'Generate a dataset and load it into storage',
                'POST /api/etl/preview': 'Generate a dataset without storing it',
                'GET /health': 'System health check',
                'GET /api': 'This API information'
            },
            defaults: config.defaults,
            persistence: config.persistenceDriver,
            timestamp: new Date().toISOString(),
            environment: process.env.NODE_ENV || 'development'
        });
    });

    return router;
};
