#!/usr/bin/env node
import { runHhsLoad } from '../etl/hhsLoader';
import { HHS_ROW_SCHEMA_ID } from '../lib/schemas';
import { closeRuntime, createRuntime, exitCodeFor, exitWith, Runtime } from './runtime';

export const USAGE = 'Usage: load-hhs <csv_file_path>';

/** `load-hhs <csv_file_path>`; resolves to the process exit code. */
export const main = async (argv: string[], runtimeFactory: () => Runtime = createRuntime): Promise<number> => {
    const runtime = runtimeFactory();
    const { logger, config, contracts } = runtime;
    try {
        if (argv.length !== 1) {
            logger.error(USAGE);
            return 1;
        }
        const outcome = await runHhsLoad({
            filePath: argv[0],
            db: runtime.pool,
            logger,
            batchSize: config.hhsBatchSize,
            contract: contracts.has(HHS_ROW_SCHEMA_ID) ? contracts.contract(HHS_ROW_SCHEMA_ID) : undefined,
        });
        return exitCodeFor(logger, outcome);
    } finally {
        await closeRuntime(runtime);
    }
};

if (require.main === module) {
    exitWith(() => main(process.argv.slice(2)));
}
