import { Request, Response, NextFunction } from 'express';
import { logger } from '../config/logger';
import { ErrorResponse } from '../types/api';

export interface AppError extends Error {
    statusCode?: number;
    status?: string;
    isOperational?: boolean;
}

export type PipelineStage = 'entities' | 'transactions' | 'settlement' | 'persistence';

export const errorHandler = (
    err: AppError,
    req: Request,
    res: Response,
    _next: NextFunction
): void => {
    const statusCode = err.statusCode || 500;
    const status = err.status || 'error';

    logger.error('API error occurred:', {
        name: err.name,
        message: err.message,
        stack: err.stack,
        statusCode,
        path: req.path,
        method: req.method,
        body: req.body
    });

    const errorResponse: ErrorResponse = {
        success: false,
        status,
        error: err.name,
        message: err.message || 'Internal Server Error',
        timestamp: new Date().toISOString(),
        path: req.path,
        method: req.method
    };

    if (process.env.NODE_ENV == 'development') {
        errorResponse.stack = err.stack;
    }

    res.status(statusCode).json(errorResponse);
};

export class ValidationError extends Error {
    statusCode = 400;
    status = 'fail';
    isOperational = true;

    constructor(message: string) {
        super(message);
        this.name = 'ValidationError';
    }
}

export class NotFoundError extends Error {
    statusCode = 404;
    status = 'fail';
    isOperational = true;

    constructor(message: string) {
        super(message);
        this.name = 'NotFoundError';
    }
}

export class DatabaseError extends Error {
    statusCode = 500;
    status = 'error';
    isOperational = true;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'DatabaseError';
    }
}

/**
 * A run was requested that cannot produce a coherent dataset, e.g. payments
 * sampled from an empty population. Raised before any data is generated.
 */
export class PipelineConfigurationError extends Error {
    statusCode = 422;
    status = 'fail';
    isOperational = true;

    constructor(public readonly stage: PipelineStage, message: string) {
        super(`[${stage}] ${message}`);
        this.name = 'PipelineConfigurationError';
    }
}

export class ReferentialIntegrityError extends Error {
    statusCode = 500;
    status = 'error';
    isOperational = false;

    constructor(
        public readonly stage: PipelineStage,
        public readonly entityId: string,
        public readonly referenceId: string,
        message: string
    ) {
        super(`[${stage}] ${message} (${entityId} -> ${referenceId})`);
        this.name = 'ReferentialIntegrityError';
    }
}

type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<void>;

export const asyncHandler = (fn: AsyncRoute) => {
    return (req: Request, res: Response, next: NextFunction) => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
};
