import type { ConnectionSource, Queryable } from '../db';
import { withTransaction } from '../db/transaction';
import { describeError } from '../lib/errors';
import type { Logger } from '../lib/logger';
import type { RowContract } from '../lib/schemas';
import { ensureReadableFile, extractCsv } from './extract';
import { dedupeFirst, hospitalKeyOf, normalizeQualityRecord, parseIsoDate, QUALITY_COLUMNS } from './normalize';
import { addCounts, emptyCounts, IsoDate, LoadOutcome, QualityRecord, UpsertCounts } from './types';
import { UpsertEngine } from './upsert';

export const DEFAULT_QUALITY_BATCH_SIZE = 1000;

export interface QualityLoadOptions {
    ratingDate: string;
    filePath: string;
    db: ConnectionSource;
    logger: Logger;
    batchSize?: number;
    contract?: RowContract;
}

export type QualityLoadResult = LoadOutcome<{ rows: number }>;

const streamQualityFile = async (
    db: Queryable,
    options: QualityLoadOptions,
    ratingDate: IsoDate,
    engine: UpsertEngine,
): Promise<{ rows: number; counts: UpsertCounts }> => {
    const batchSize = options.batchSize ?? DEFAULT_QUALITY_BATCH_SIZE;
    const seen = new Set<string>();
    let pending: QualityRecord[] = [];
    let rows = 0;
    let counts = emptyCounts();

    const flush = async () => {
        const batch = dedupeFirst(pending, hospitalKeyOf, seen);
        pending = [];
        counts = addCounts(counts, await engine.upsertQuality(db, batch));
        options.logger.info({ rows }, `Processed ${rows} rows...`);
    };

    for await (const raw of extractCsv(options.filePath, { columns: QUALITY_COLUMNS, contract: options.contract })) {
        pending.push(normalizeQualityRecord(raw, ratingDate));
        rows++;
        if (rows % batchSize === 0) {
            await flush();
        }
    }
    if (pending.length > 0) {
        await flush();
    }
    return { rows, counts };
};

/**
 * Streams one CMS quality file into the store in batches of `batchSize` rows.
 * Every batch shares the one transaction, so a failure anywhere in the file
 * leaves nothing behind.
 */
export const runQualityLoad = async (options: QualityLoadOptions): Promise<QualityLoadResult> => {
    const { logger, filePath } = options;

    let ratingDate: IsoDate;
    try {
        ratingDate = parseIsoDate(options.ratingDate, 'rating_date');
        await ensureReadableFile(filePath);
    } catch (err) {
        logger.error({ err, file: filePath }, describeError(err));
        return { status: 'failed', error: err, rolledBack: false };
    }

    const engine = new UpsertEngine({ batchSize: options.batchSize ?? DEFAULT_QUALITY_BATCH_SIZE, logger });
    let opened = false;
    try {
        const { rows, counts } = await withTransaction(options.db, logger, (client) => {
            opened = true;
            return streamQualityFile(client, options, ratingDate, engine);
        });
        logger.info(
            { file: filePath, rows, ...counts },
            `Data loaded successfully: ${rows} rows read, ${counts.qualityRatings} ratings inserted.`,
        );
        return { status: 'committed', rows, counts };
    } catch (err) {
        logger.error({ err, file: filePath }, `An error occurred: ${describeError(err)}`);
        return { status: 'failed', error: err, rolledBack: opened };
    }
};
