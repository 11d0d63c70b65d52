import dotenv from 'dotenv';
import path from 'path';

export interface DatabaseConfig {
    connectionString?: string;
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
}

export interface AppConfig {
    port: number;
    nodeEnv: string;
    logLevel: string;
    logPretty: boolean;
    database: DatabaseConfig;
    contractsPath: string;
    /** Rows per batch for the HHS loader; undefined loads the whole file as one batch. */
    hhsBatchSize?: number;
    qualityBatchSize: number;
}

type Env = Record<string, string | undefined>;

const parsePositiveInt = (value: string | undefined): number | undefined => {
    if (!value) return undefined;
    const n = parseInt(value, 10);
    return Number.isFinite(n) && n > 0 ? n : undefined;
};

/**
 * Builds the configuration for one run. Nothing else in the project reads
 * `process.env`; entry points call this once and hand the result down.
 */
export const loadConfig = (env: Env = process.env): AppConfig => ({
    port: parsePositiveInt(env.SERVICE_PORT) ?? 8093,
    nodeEnv: env.NODE_ENV || 'development',
    logLevel: env.LOG_LEVEL || 'info',
    logPretty: env.LOG_PRETTY === 'true',
    database: {
        connectionString: env.DATABASE_URL || undefined,
        host: env.PGHOST || 'localhost',
        port: parsePositiveInt(env.PGPORT) ?? 5432,
        database: env.PGDATABASE || 'hospital_capacity',
        user: env.PGUSER && env.PGUSER !== 'root' ? env.PGUSER : 'postgres',
        password: env.PGPASSWORD || 'postgres',
    },
    contractsPath: env.CONTRACTS_PATH || path.resolve(process.cwd(), 'contracts'),
    hhsBatchSize: parsePositiveInt(env.HHS_BATCH_SIZE),
    qualityBatchSize: parsePositiveInt(env.QUALITY_BATCH_SIZE) ?? 1000,
});

export const loadConfigFromDotenv = (): AppConfig => {
    dotenv.config();
    return loadConfig(process.env);
};
