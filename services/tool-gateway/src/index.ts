import 'dotenv/config';
import { logger, startService } from '@retailops/service-template';
import { loadConfig } from './config';
import { createGateway } from './gateway';

const config = loadConfig();
const gateway = createGateway(config);

gateway.start();
const server = startService(gateway.app, config.port);

const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    gateway.close();
    server.close(() => process.exit(0));
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
