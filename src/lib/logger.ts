import { pino, Logger } from 'pino';
import type { AppConfig } from '../config';

export type { Logger };

export const createLogger = (config: Pick<AppConfig, 'logLevel' | 'logPretty'>): Logger => {
    if (config.logPretty) {
        return pino({
            level: config.logLevel,
            transport: {
                target: 'pino-pretty',
                options: {
                    translateTime: 'HH:MM:ss Z',
                    ignore: 'pid,hostname',
                },
            },
        });
    }
    return pino({ level: config.logLevel });
};
