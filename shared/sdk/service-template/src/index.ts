import express, { Express, Request, Response, NextFunction } from 'express';
import { Server } from 'http';
import cors from 'cors';
import bodyParser from 'body-parser';
import * as winston from 'winston';

export const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: winston.format.json(),
    defaultMeta: { service: process.env.SERVICE_NAME || 'unknown-service' },
    silent: process.env.NODE_ENV === 'test',
    transports: [
        new winston.transports.Console()
    ]
});

export interface ServiceOptions {
    jsonLimit?: string;
}

export const createService = (name: string, options: ServiceOptions = {}): Express => {
    const app = express();

    app.use(cors());
    app.use(bodyParser.json({ limit: options.jsonLimit || '100kb' }));

    // Request logging
    app.use((req: Request, res: Response, next: NextFunction) => {
        const requestId = req.headers['x-request-id'] || 'unknown';
        logger.info(`Incoming request: ${req.method} ${req.url}`, { request_id: requestId });

        res.on('finish', () => {
            const level = res.statusCode >= 500 ? 'error' : 'info';
            logger.log(level, `Completed ${req.method} ${req.url}`, { status: res.statusCode, request_id: requestId });
        });

        next();
    });

    // Liveness probe
    app.get('/health', (req: Request, res: Response) => {
        res.json({ status: 'ok', service: name });
    });

    return app;
};

const statusOf = (err: unknown): number | undefined => {
    if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
        return err.status;
    }
    return undefined;
};

// Must be registered after every route so it sees errors passed to next().
export const installErrorHandler = (app: Express): void => {
    app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
        if (res.headersSent) {
            next(err);
            return;
        }

        const status = statusOf(err);
        if (status !== undefined && status >= 400 && status < 500) {
            logger.warn('Rejected malformed request', { method: req.method, url: req.url, status });
            res.status(status).json({ error: 'Malformed request body' });
            return;
        }

        logger.error('Unhandled error', { method: req.method, url: req.url, error: err instanceof Error ? err.message : String(err) });
        res.status(500).json({ error: 'Internal Server Error' });
    });
};

export const startService = (app: Express, port: number): Server => {
    return app.listen(port, () => {
        logger.info(`Service listening on port ${port}`);
    });
};
