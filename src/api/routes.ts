import { FastifyInstance } from 'fastify';
import { Queryable } from '../db';
import { buildWeeklyReport, listRecentWeeks } from '../domain/report';
import { isIsoDate } from '../etl/normalize';

export interface RouteDeps {
    db: Queryable;
}

export const registerRoutes = async (server: FastifyInstance, deps: RouteDeps) => {
    const { db } = deps;

    // Health
    server.get('/health', async () => {
        return { status: 'ok' };
    });

    // Ready
    server.get('/ready', async (req, reply) => {
        try {
            await db.query('SELECT 1');
            return { status: 'ready' };
        } catch (err) {
            req.log.warn({ err }, 'Readiness check failed');
            reply.code(503);
            return { status: 'not_ready', reason: 'DB unreachable' };
        }
    });

    // Weeks available for reporting, newest first
    server.get('/reports/weeks', async () => {
        return { weeks: await listRecentWeeks(db) };
    });

    server.get<{ Querystring: { week?: string } }>('/reports/weekly', async (req, reply) => {
        const { week } = req.query;

        let reportWeek = week;
        if (reportWeek === undefined) {
            const [latest] = await listRecentWeeks(db, 1);
            if (!latest) {
                reply.code(404);
                return { error: 'No weekly data loaded' };
            }
            reportWeek = latest;
        } else if (!isIsoDate(reportWeek)) {
            reply.code(400);
            return { error: 'week must be a date in YYYY-MM-DD format' };
        }

        return await buildWeeklyReport(db, reportWeek);
    });
};
