import path from 'path';
import { loadConfig } from '../src/config';

describe('loadConfig', () => {
    test('falls back to local defaults', () => {
        const config = loadConfig({});

        expect(config.port).toBe(8093);
        expect(config.logLevel).toBe('info');
        expect(config.logPretty).toBe(false);
        expect(config.hhsBatchSize).toBeUndefined();
        expect(config.qualityBatchSize).toBe(1000);
        expect(config.contractsPath).toBe(path.resolve(process.cwd(), 'contracts'));
        expect(config.database).toEqual({
            connectionString: undefined,
            host: 'localhost',
            port: 5432,
            database: 'hospital_capacity',
            user: 'postgres',
            password: 'postgres',
        });
    });

    test('reads the environment it is given', () => {
        const config = loadConfig({
            DATABASE_URL: 'postgres://etl:test-secret@db:5432/capacity',
            LOG_LEVEL: 'debug',
            LOG_PRETTY: 'true',
            HHS_BATCH_SIZE: '500',
            QUALITY_BATCH_SIZE: '250',
            PGUSER: 'etl',
        });

        expect(config.database.connectionString).toBe('postgres://etl:test-secret@db:5432/capacity');
        expect(config.database.user).toBe('etl');
        expect(config.logLevel).toBe('debug');
        expect(config.logPretty).toBe(true);
        expect(config.hhsBatchSize).toBe(500);
        expect(config.qualityBatchSize).toBe(250);
    });

    test('ignores batch sizes that are not positive integers', () => {
        const config = loadConfig({ HHS_BATCH_SIZE: 'all', QUALITY_BATCH_SIZE: '0' });
        expect(config.hhsBatchSize).toBeUndefined();
        expect(config.qualityBatchSize).toBe(1000);
    });

    test('a root PGUSER falls back to postgres', () => {
        expect(loadConfig({ PGUSER: 'root' }).database.user).toBe('postgres');
    });
});
