import { createApp } from './app';
import { closePool, getPool, testConnection } from './config/database';
import { logger } from './config/logger';
import { loadPipelineConfig } from './config/pipeline';
import { InMemoryPersistenceSink } from './models/InMemoryPersistenceSink';
import { PgPersistenceSink } from './models/PgPersistenceSink';
import { PersistenceSink } from './types/persistence';

const PORT = process.env.PORT || 3000;

const config = loadPipelineConfig();

const sink: PersistenceSink = config.persistenceDriver == 'memory'
    ? new InMemoryPersistenceSink()
    : new PgPersistenceSink(getPool());

if (config.persistenceDriver == 'postgres') {
    void testConnection();
}

const app = createApp({ sink, config });

const server = app.listen(PORT, () => {
    logger.info(`Payment dataset generator running on port ${PORT}`);
    logger.info(`Health check: http://localhost:${PORT}/health`);
    logger.info(`API Base URL: http://localhost:${PORT}/api`);
});

const shutdown = (signal: string) => {
    logger.info(`${signal} signal received: closing HTTP server`);
    server.close(() => {
        logger.info('HTTP server closed');
        closePool()
            .then(() => process.exit(0))
            .catch(error => {
                logger.error('Error closing database pool', error);
                process.exit(1);
            });
    });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
