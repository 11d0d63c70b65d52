import { INSERT_QUALITY_RATINGS_SQL } from '../src/domain/quality';
import { QUALITY_COLUMNS } from '../src/etl/normalize';
import { DEFAULT_QUALITY_BATCH_SIZE, runQualityLoad } from '../src/etl/qualityLoader';
import { IntegrityError, InvalidDateError, NotFoundError } from '../src/lib/errors';
import { makeTempDir, toCsv, writeFile } from './support/csv';
import { captureLogger, silentLogger } from './support/logger';
import { FakePgError, MemoryDatabase } from './support/memoryDatabase';

const dir = makeTempDir();

const facility = (id: string, city: string, rating: string, emergency = 'Yes'): Record<string, string> => ({
    'Facility ID': id,
    'Facility Name': `Facility ${id}`,
    City: city,
    State: 'TX',
    'ZIP Code': '75001',
    'Hospital Ownership': 'Government - Local',
    'Emergency Services': emergency,
    'Hospital Type': 'Acute Care Hospitals',
    'Hospital overall rating': rating,
});

const qualityFile = () =>
    writeFile(
        dir,
        'quality.csv',
        toCsv(QUALITY_COLUMNS, [
            facility('450001', 'Addison', '4'),
            facility('450002', 'Allen', 'Not Available', 'No'),
            facility('450001', 'Addison', '1'),
            facility('450003', 'Austin', '5'),
            facility('450002', 'Allen', '3'),
        ]),
    );

describe('runQualityLoad', () => {
    test('streams in batches and keeps the first row per facility across batches', async () => {
        const memory = new MemoryDatabase();
        const { logger, lines } = captureLogger();

        const result = await runQualityLoad({
            ratingDate: '2023-01-15',
            filePath: qualityFile(),
            db: memory,
            logger,
            batchSize: 2,
        });

        expect(result).toEqual({
            status: 'committed',
            rows: 5,
            counts: { locations: 3, hospitals: 3, weeklyReports: 0, qualityRatings: 3 },
        });
        expect(lines.filter((l) => l.msg.startsWith('Processed')).map((l) => l.msg)).toEqual([
            'Processed 2 rows...',
            'Processed 4 rows...',
            'Processed 5 rows...',
        ]);
        expect(lines[lines.length - 1].msg).toBe('Data loaded successfully: 5 rows read, 3 ratings inserted.');
        expect(memory.tables.hospital_quality.map((q) => [q.facility_id, q.quality_rating])).toEqual([
            ['450001', 4],
            ['450002', null],
            ['450003', 5],
        ]);
        expect(memory.tables.hospital_quality[1].provides_emergency_services).toBe(false);
        expect(memory.connections).toBe(1);
    });

    test('the same rating date twice stores each rating once', async () => {
        const memory = new MemoryDatabase();
        const file = qualityFile();
        await runQualityLoad({ ratingDate: '2023-01-15', filePath: file, db: memory, logger: silentLogger() });

        const again = await runQualityLoad({ ratingDate: '2023-01-15', filePath: file, db: memory, logger: silentLogger() });
        const later = await runQualityLoad({ ratingDate: '2023-07-15', filePath: file, db: memory, logger: silentLogger() });

        expect(again).toMatchObject({ status: 'committed', counts: { qualityRatings: 0, hospitals: 0 } });
        expect(later).toMatchObject({ status: 'committed', counts: { qualityRatings: 3, hospitals: 0 } });
        expect(memory.tables.hospital_quality).toHaveLength(6);
    });

    test('a failed write leaves nothing from the file', async () => {
        const memory = new MemoryDatabase();
        memory.failOn(INSERT_QUALITY_RATINGS_SQL, new FakePgError('duplicate key value', '23505'));

        const result = await runQualityLoad({
            ratingDate: '2023-01-15',
            filePath: qualityFile(),
            db: memory,
            logger: silentLogger(),
        });

        expect(result).toMatchObject({ status: 'failed', rolledBack: true });
        if (result.status === 'failed') expect(result.error).toBeInstanceOf(IntegrityError);
        expect(memory.tables.hospital).toHaveLength(0);
        expect(memory.tables.location).toHaveLength(0);
    });

    test('an invalid rating date fails before any connection is taken', async () => {
        const memory = new MemoryDatabase();

        const result = await runQualityLoad({
            ratingDate: '2023-02-30',
            filePath: qualityFile(),
            db: memory,
            logger: silentLogger(),
        });

        expect(result).toMatchObject({ status: 'failed', rolledBack: false });
        if (result.status === 'failed') expect(result.error).toBeInstanceOf(InvalidDateError);
        expect(memory.connections).toBe(0);
    });

    test('a missing file fails before any connection is taken', async () => {
        const memory = new MemoryDatabase();

        const result = await runQualityLoad({
            ratingDate: '2023-01-15',
            filePath: `${dir}/nope.csv`,
            db: memory,
            logger: silentLogger(),
        });

        if (result.status === 'failed') expect(result.error).toBeInstanceOf(NotFoundError);
        expect(result.status).toBe('failed');
        expect(memory.connections).toBe(0);
    });

    test('defaults to batches of a thousand rows', () => {
        expect(DEFAULT_QUALITY_BATCH_SIZE).toBe(1000);
    });
});
