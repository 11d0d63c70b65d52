import { Pool, QueryResult, QueryResultRow } from 'pg';
import type { DatabaseConfig } from '../config';
import { ConnectionError, describeError, IntegrityError, IntegrityViolation } from '../lib/errors';
import type { Logger } from '../lib/logger';

// Generic query interface compatible with Pool and PoolClient
export interface Queryable {
    query<R extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<R>>;
}

export interface TransactionClient extends Queryable {
    release(err?: Error | boolean): void;
}

export interface ConnectionSource {
    connect(): Promise<TransactionClient>;
}

/**
 * One pool per run. Loaders hold a single client for their whole run, so the
 * pool never needs more than one connection there; the report server raises it.
 */
export const createPool = (config: DatabaseConfig, logger: Logger, max = 1): Pool => {
    const pool = config.connectionString
        ? new Pool({ connectionString: config.connectionString, max })
        : new Pool({
            host: config.host,
            port: config.port,
            database: config.database,
            user: config.user,
            password: config.password,
            max,
        });

    pool.on('error', (err) => {
        logger.error(err, 'Unexpected error on idle client');
    });

    return pool;
};

// pg and socket errors may come from another realm, so match on shape rather than `instanceof Error`.
const hasCode = (err: unknown): err is { code: string } =>
    typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string';

const CONNECTION_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT', 'EHOSTUNREACH']);

const integrityViolation = (code: string): IntegrityViolation => {
    switch (code) {
        case '23503':
            return 'foreign_key';
        case '23505':
            return 'unique';
        case '23502':
            return 'not_null';
        case '23514':
            return 'check';
        default:
            return code.startsWith('22') ? 'data' : 'other';
    }
};

/**
 * Maps a pg driver error onto the pipeline taxonomy by SQLSTATE class.
 * Errors that are neither integrity nor connection problems come back as they were.
 */
export const classifyDatabaseError = (err: unknown): unknown => {
    if (!hasCode(err)) return err;
    const { code } = err;

    if (code.startsWith('23') || code.startsWith('22')) {
        return new IntegrityError(describeError(err), integrityViolation(code), code, { cause: err });
    }
    if (CONNECTION_CODES.has(code) || code.startsWith('08') || code.startsWith('28') || code === '3D000') {
        return new ConnectionError(describeError(err), { cause: err });
    }
    return err;
};

export const connect = async (source: ConnectionSource): Promise<TransactionClient> => {
    try {
        return await source.connect();
    } catch (err) {
        const classified = classifyDatabaseError(err);
        if (classified instanceof ConnectionError) throw classified;
        throw new ConnectionError(describeError(err), { cause: err });
    }
};
