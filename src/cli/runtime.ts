import { AppConfig, loadConfigFromDotenv } from '../config';
import { ConnectionSource, createPool } from '../db';
import type { LoadOutcome } from '../etl/types';
import { errorKind } from '../lib/errors';
import { createLogger, Logger } from '../lib/logger';
import { ContractRegistry } from '../lib/schemas';

export type RuntimePool = ConnectionSource & { end(): Promise<void> };

/** Everything one CLI run owns, created at start and closed at exit. */
export interface Runtime {
    config: AppConfig;
    logger: Logger;
    pool: RuntimePool;
    contracts: ContractRegistry;
}

export const createRuntime = (config: AppConfig = loadConfigFromDotenv()): Runtime => {
    const logger = createLogger(config);
    return {
        config,
        logger,
        pool: createPool(config.database, logger),
        contracts: new ContractRegistry(logger).load(config.contractsPath),
    };
};

export const closeRuntime = async (runtime: Runtime): Promise<void> => {
    await runtime.pool.end();
    runtime.logger.debug('Database connection closed.');
};

/** 0 for a committed run; otherwise logs which stage failed and returns 1. */
export const exitCodeFor = <T>(logger: Logger, outcome: LoadOutcome<T>): number => {
    if (outcome.status === 'committed') return 0;
    const kind = errorKind(outcome.error);
    logger.error({ kind, rolledBack: outcome.rolledBack }, `Load failed (${kind} error)`);
    return 1;
};

export const exitWith = (run: () => Promise<number>): void => {
    run()
        .then((code) => process.exit(code))
        .catch((err) => {
            process.stderr.write(`${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
            process.exit(1);
        });
};
