// Express application - middleware stack, health check and API mounting

import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import Logger from './utils/logger';
import { AppError, NotFoundError } from './utils/errors';
import { createApiRouter, type ApiServices } from './routes/api';

export function createApp(services: ApiServices): express.Express {
    const app = express();
    const { settings } = services.config.current();

    app.use(helmet({
        contentSecurityPolicy: false,
    }));
    app.use(cors());
    app.use(express.json());

    app.use((req, res, next) => {
        const startTime = Date.now();
        res.on('finish', () => {
            Logger.http(`${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - startTime}ms`);
        });
        next();
    });

    const limiter = rateLimit({
        windowMs: settings.rateLimit.windowMs,
        limit: settings.rateLimit.limit,
        standardHeaders: true,
        legacyHeaders: false,
        message: { error: 'Too many requests, please try again later', code: 'RATE_LIMITED' },
    });
    app.use('/api', limiter);

    // Health check endpoint for container probes
    app.get('/api/health', (req, res) => {
        const snapshot = services.config.current();
        res.json({
            status: 'healthy',
            timestamp: new Date().toISOString(),
            uptime: process.uptime(),
            engines: snapshot.enabledSources.size,
            anonymized: snapshot.settings.anonymize,
        });
    });

    app.use('/api/v1', createApiRouter(services));

    app.use('/api', (req, res, next) => {
        next(new NotFoundError(`Route not found: ${req.method} ${req.path}`));
    });

    app.use(errorHandler);

    return app;
}

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
    if (res.headersSent) {
        next(err);
        return;
    }

    if (err instanceof AppError) {
        if (err.status >= 500) {
            Logger.error(`❌ ${err.code}: ${err.message}`);
        }
        if (req.accepts(['application/json', 'text/plain']) === 'text/plain') {
            res.status(err.status).type('text/plain').send(`error: ${err.message}\n`);
            return;
        }
        res.status(err.status).json({ error: err.message, code: err.code, details: err.details });
        return;
    }

    Logger.error('❌ Unhandled error:', err);
    res.status(500).json({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
}
