import { classifyDatabaseError, Queryable } from '../db';
import { resolveHospitals } from '../domain/hospital';
import { resolveLocations } from '../domain/location';
import { insertQualityRatings } from '../domain/quality';
import { insertWeeklyReports } from '../domain/weeklyReport';
import type { Logger } from '../lib/logger';
import { addCounts, emptyCounts, HhsRecord, HospitalKey, LocationKey, QualityRecord, UpsertCounts } from './types';

/** Splits `items` into runs of at most `size`; no size (or 0) keeps them together. */
export const chunk = <T>(items: T[], size?: number): T[][] => {
    if (items.length === 0) return [];
    if (!size || size <= 0 || size >= items.length) return [items];
    const out: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        out.push(items.slice(i, i + size));
    }
    return out;
};

export interface UpsertEngineOptions {
    batchSize?: number;
    logger: Logger;
}

type Dimensional = { hospital: HospitalKey; location: LocationKey };

/**
 * Writes normalized records batch by batch, each batch in dependency order:
 * locations, then hospitals, then the fact table. Failures are classified,
 * logged with their batch and re-thrown; nothing is retried here.
 */
export class UpsertEngine {
    private batchesWritten = 0;

    constructor(private readonly options: UpsertEngineOptions) {}

    async upsertWeekly(db: Queryable, records: HhsRecord[]): Promise<UpsertCounts> {
        return this.upsert(db, records, 'weekly_report', async (batch, hospitalIds) => ({
            ...emptyCounts(),
            weeklyReports: await insertWeeklyReports(
                db,
                batch.map((r, i) => ({
                    collection_week: r.collection_week,
                    metrics: r.metrics,
                    hospital_weekly_id: hospitalIds[i],
                })),
            ),
        }));
    }

    async upsertQuality(db: Queryable, records: QualityRecord[]): Promise<UpsertCounts> {
        return this.upsert(db, records, 'hospital_quality', async (batch, hospitalIds) => ({
            ...emptyCounts(),
            qualityRatings: await insertQualityRatings(
                db,
                batch.map((r, i) => ({
                    facility_id: hospitalIds[i],
                    quality_rating: r.quality_rating,
                    rating_date: r.rating_date,
                    ownership: r.ownership,
                    hospital_type: r.hospital_type,
                    provides_emergency_services: r.provides_emergency_services,
                })),
            ),
        }));
    }

    private async upsert<R extends Dimensional>(
        db: Queryable,
        records: R[],
        factTable: string,
        writeFacts: (batch: R[], hospitalIds: string[]) => Promise<UpsertCounts>,
    ): Promise<UpsertCounts> {
        let counts = emptyCounts();
        for (const batch of chunk(records, this.options.batchSize)) {
            const index = ++this.batchesWritten;
            const context = { batch: index, rows: batch.length };

            const locations = await this.step({ ...context, table: 'location' }, () =>
                resolveLocations(db, batch.map((r) => r.location)),
            );
            const hospitals = await this.step({ ...context, table: 'hospital' }, () =>
                resolveHospitals(
                    db,
                    batch.map((r, i) => ({ ...r.hospital, location_id: locations.ids[i] })),
                ),
            );
            const facts = await this.step({ ...context, table: factTable }, () => writeFacts(batch, hospitals.ids));

            const written = { ...facts, locations: locations.inserted, hospitals: hospitals.inserted };
            this.options.logger.debug({ ...context, ...written }, 'Batch written');
            counts = addCounts(counts, written);
        }
        return counts;
    }

    private async step<T>(context: { batch: number; rows: number; table: string }, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn();
        } catch (err) {
            const classified = classifyDatabaseError(err);
            this.options.logger.error({ err: classified, ...context }, `Failed to write ${context.table} batch`);
            throw classified;
        }
    }
}
