import path from 'path';
import type { ConnectionSource } from '../db';
import { withTransaction } from '../db/transaction';
import { describeError } from '../lib/errors';
import type { Logger } from '../lib/logger';
import type { RowContract } from '../lib/schemas';
import { extractCsv } from './extract';
import { HHS_COLUMNS, normalizeHhsRecord } from './normalize';
import type { HhsRecord, LoadOutcome } from './types';
import { UpsertEngine } from './upsert';

export interface HhsLoadOptions {
    filePath: string;
    db: ConnectionSource;
    logger: Logger;
    /** Undefined writes the whole file as one batch. */
    batchSize?: number;
    contract?: RowContract;
}

export type HhsLoadResult = LoadOutcome<{ hospitals: number; week: string }>;

/** The week label of an HHS extract: the first 10 characters of its file name. */
export const weekFromFileName = (filePath: string): string => path.basename(filePath).slice(0, 10);

/** Reads and normalizes one extract; rows repeating an earlier hospital_pk are dropped before normalizing. */
export const prepareHhsRecords = async (filePath: string, contract?: RowContract): Promise<HhsRecord[]> => {
    const records: HhsRecord[] = [];
    for await (const raw of extractCsv(filePath, { columns: HHS_COLUMNS, contract, distinctBy: 'hospital_pk' })) {
        records.push(normalizeHhsRecord(raw));
    }
    return records;
};

/**
 * Loads one HHS capacity file. The file is read and normalized in full before
 * a connection is taken; all writes then happen in a single transaction.
 */
export const runHhsLoad = async (options: HhsLoadOptions): Promise<HhsLoadResult> => {
    const { filePath, logger } = options;
    const week = weekFromFileName(filePath);

    let records: HhsRecord[];
    try {
        records = await prepareHhsRecords(filePath, options.contract);
    } catch (err) {
        logger.error({ err, file: filePath }, `Error occurred: ${describeError(err)}`);
        return { status: 'failed', error: err, rolledBack: false };
    }
    logger.debug({ file: filePath, hospitals: records.length }, 'Prepared HHS records');

    const engine = new UpsertEngine({ batchSize: options.batchSize, logger });
    let opened = false;
    try {
        const counts = await withTransaction(options.db, logger, (client) => {
            opened = true;
            return engine.upsertWeekly(client, records);
        });
        logger.info(
            { file: filePath, week, ...counts },
            `Data on ${records.length} unique hospitals successfully inserted for week: ${week}`,
        );
        return { status: 'committed', counts, hospitals: records.length, week };
    } catch (err) {
        logger.error({ err, file: filePath }, `Error occurred: ${describeError(err)}`);
        return { status: 'failed', error: err, rolledBack: opened };
    }
};
