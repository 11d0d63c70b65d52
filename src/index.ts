import Fastify from 'fastify';
import { loadConfigFromDotenv } from './config';
import { registerRoutes } from './api/routes';
import { createPool } from './db';
import { createLogger } from './lib/logger';

const config = loadConfigFromDotenv();
const logger = createLogger(config);
const pool = createPool(config.database, logger, 5);

const server = Fastify({
    logger: {
        level: config.logLevel,
        transport: config.logPretty
            ? {
                target: 'pino-pretty',
                options: {
                    translateTime: 'HH:MM:ss Z',
                    ignore: 'pid,hostname',
                },
            }
            : undefined,
    },
});

const start = async () => {
    try {
        await registerRoutes(server, { db: pool });

        await server.listen({ port: config.port, host: '0.0.0.0' });
        server.log.info(`Report server listening on port ${config.port}`);
    } catch (err) {
        server.log.error(err);
        process.exit(1);
    }
};

// Graceful shutdown
const signals = ['SIGINT', 'SIGTERM'];
signals.forEach((signal) => {
    process.on(signal, () => {
        server.log.info(`Received ${signal}, shutting down...`);
        server.close()
            .then(() => pool.end())
            .then(() => process.exit(0))
            .catch((err) => {
                server.log.error(err, 'Shutdown failed');
                process.exit(1);
            });
    });
});

void start();
