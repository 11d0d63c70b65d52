#!/usr/bin/env node
import { runQualityLoad } from '../etl/qualityLoader';
import { QUALITY_ROW_SCHEMA_ID } from '../lib/schemas';
import { closeRuntime, createRuntime, exitCodeFor, exitWith, Runtime } from './runtime';

export const USAGE = 'Usage: load-quality <rating_date YYYY-MM-DD> <quality-data-file.csv>';

/** `load-quality <rating_date> <csv_file_path>`; resolves to the process exit code. */
export const main = async (argv: string[], runtimeFactory: () => Runtime = createRuntime): Promise<number> => {
    const runtime = runtimeFactory();
    const { logger, config, contracts } = runtime;
    try {
        if (argv.length !== 2) {
            logger.error(USAGE);
            return 1;
        }
        const [ratingDate, filePath] = argv;
        const outcome = await runQualityLoad({
            ratingDate,
            filePath,
            db: runtime.pool,
            logger,
            batchSize: config.qualityBatchSize,
            contract: contracts.has(QUALITY_ROW_SCHEMA_ID) ? contracts.contract(QUALITY_ROW_SCHEMA_ID) : undefined,
        });
        return exitCodeFor(logger, outcome);
    } finally {
        await closeRuntime(runtime);
    }
};

if (require.main === module) {
    exitWith(() => main(process.argv.slice(2)));
}
