import request from 'supertest';
import { createApp } from '../src/app';
import { PipelineConfig } from '../src/config/pipeline';
import { InMemoryPersistenceSink } from '../src/models/InMemoryPersistenceSink';

const config: PipelineConfig = {
    defaults: { customers: 4, merchants: 2, transactions: 10 },
    seed: null,
    windowDays: 90,
    currency: 'USD',
    persistenceDriver: 'memory'
};

describe('ETL API', () => {
    let sink: InMemoryPersistenceSink;
    let app: ReturnType<typeof createApp>;

    beforeEach(() => {
        sink = new InMemoryPersistenceSink();
        app = createApp({ sink, config });
    });

    it('reports health', async () => {
        const response = await request(app).get('/health');

        expect(response.status).toBe(200);
        expect(response.body.status).toBe('OK');
        expect(response.body.persistence).toBe('memory');
    });

    it('describes the API', async () => {
        const response = await request(app).get('/api');

        expect(response.status).toBe(200);
        expect(response.body.defaults).toEqual(config.defaults);
    });

    it('runs the pipeline and stores the dataset', async () => {
        const response = await request(app)
            .post('/api/etl/run')
            .send({ customers: 5, merchants: 2, transactions: 20, seed: 1 });

        expect(response.status).toBe(201);
        expect(response.body.success).toBe(true);
        expect(response.body.data.seed).toBe(1);
        expect(response.body.data.generated).toMatchObject({ customers: 5, merchants: 2, payments: 20 });
        expect(response.body.data.inserted).toEqual(response.body.data.generated);
        expect(sink.count('payments')).toBe(20);
    });

    it('falls back to configured counts', async () => {
        const response = await request(app).post('/api/etl/run').send({});

        expect(response.status).toBe(201);
        expect(response.body.data.generated).toMatchObject({ customers: 4, merchants: 2, payments: 10 });
        expect(response.body.data.seed).toBeNull();
    });

    it('previews a dataset without storing it', async () => {
        const response = await request(app)
            .post('/api/etl/preview')
            .send({ customers: 3, merchants: 1, transactions: 40, seed: 2 });

        expect(response.status).toBe(200);
        expect(response.body.data.generated).toMatchObject({ customers: 3, merchants: 1, payments: 40 });
        expect(response.body.data.settlements.length).toBeLessThanOrEqual(10);
        expect(sink.count('customers')).toBe(0);
    });

    it('rejects invalid counts', async () => {
        const response = await request(app).post('/api/etl/run').send({ customers: -1 });

        expect(response.status).toBe(400);
        expect(response.body.error).toBe('ValidationError');
        expect(response.body.message).toBe('Invalid request data: "customers" must be greater than or equal to 0');
    });

    it('rejects seeds wider than 32 bits', async () => {
        const response = await request(app)
            .post('/api/etl/run')
            .send({ customers: 1, merchants: 1, transactions: 1, seed: 2 ** 32 + 1 });

        expect(response.status).toBe(400);
        expect(response.body.message).toBe('Invalid request data: "seed" must be less than or equal to 4294967295');
        expect(sink.count('customers')).toBe(0);
    });

    it('refuses to sample payments from an empty population', async () => {
        const response = await request(app)
            .post('/api/etl/run')
            .send({ customers: 0, merchants: 2, transactions: 5 });

        expect(response.status).toBe(422);
        expect(response.body.error).toBe('PipelineConfigurationError');
        expect(sink.count('customers')).toBe(0);
    });

    it('answers unknown routes with 404', async () => {
        const response = await request(app).get('/api/unknown');

        expect(response.status).toBe(404);
        expect(response.body.error).toBe('NotFoundError');
    });
});
