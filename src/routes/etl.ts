import { Router, Request, Response } from 'express';
import Joi from 'joi';
import { COUNT_LIMITS, MAX_SEED, PipelineConfig } from '../config/pipeline';
import { ValidationError, asyncHandler } from '../middleware/errorHandler';
import { PipelineOrchestrator, countDataset } from '../services/pipelineOrchestrator';
import { ApiResponse } from '../types/api';
import { PipelineCounts, PipelineRunSummary } from '../types/financial';
import { PersistenceSink } from '../types/persistence';

const PREVIEW_SETTLEMENTS = 10;

interface RunRequest extends PipelineCounts {
    seed?: number;
}

const buildRunSchema = (config: PipelineConfig) => Joi.object({
    customers: Joi.number().integer().min(0).max(COUNT_LIMITS.customers).default(config.defaults.customers),
    merchants: Joi.number().integer().min(0).max(COUNT_LIMITS.merchants).default(config.defaults.merchants),
    transactions: Joi.number().integer().min(0).max(COUNT_LIMITS.transactions).default(config.defaults.transactions),
    seed: Joi.number().integer().min(0).max(MAX_SEED).optional()
});

export const createEtlRouter = (sink: PersistenceSink, config: PipelineConfig): Router => {
    const router = Router();
    const runSchema = buildRunSchema(config);

    const parseRunRequest = (req: Request): RunRequest => {
        const { error, value } = runSchema.validate(req.body ?? {});

        if (error) {
            throw new ValidationError(`Invalid request data: ${error.details[0].message}`);
        }

        return value;
    };

    const createOrchestrator = (request: RunRequest) => new PipelineOrchestrator(sink, {
        seed: request.seed ?? config.seed,
        windowDays: config.windowDays,
        currency: config.currency
    });

    router.post('/run', asyncHandler(async (req: Request, res: Response) => {
        const request = parseRunRequest(req);
        const summary = await createOrchestrator(request).run(request);

        const response: ApiResponse<PipelineRunSummary> = {
            success: true,
            data: summary,
            message: 'ETL pipeline completed successfully',
            timestamp: new Date().toISOString()
        };

        res.status(201).json(response);
    }));

    router.post('/preview', asyncHandler(async (req: Request, res: Response) => {
        const request = parseRunRequest(req);
        const dataset = createOrchestrator(request).generate(request);

        res.json({
            success: true,
            data: {
                generated: countDataset(dataset),
                settlements: dataset.settlements.slice(0, PREVIEW_SETTLEMENTS)
            },
            timestamp: new Date().toISOString()
        });
    }));

    return router;
};
