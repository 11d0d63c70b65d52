import { TransactionCoordinator, withTransaction } from '../src/db/transaction';
import { ConnectionError, TransactionStateError } from '../src/lib/errors';
import { silentLogger } from './support/logger';
import { MemoryDatabase } from './support/memoryDatabase';

describe('TransactionCoordinator', () => {
    const client = () => ({ query: jest.fn().mockResolvedValue({ rows: [], rowCount: 0 }), release: jest.fn() });

    test('moves IDLE -> OPEN -> COMMITTED', async () => {
        const c = client();
        const tx = new TransactionCoordinator(c, silentLogger());
        expect(tx.current).toBe('IDLE');
        await tx.begin();
        expect(tx.current).toBe('OPEN');
        await tx.commit();
        expect(tx.current).toBe('COMMITTED');
        expect(c.query.mock.calls.map((call) => call[0])).toEqual(['BEGIN', 'COMMIT']);
    });

    test('refuses to commit twice or roll back after commit', async () => {
        const tx = new TransactionCoordinator(client(), silentLogger());
        await tx.begin();
        await tx.commit();
        await expect(tx.commit()).rejects.toThrow(TransactionStateError);
        await expect(tx.rollback()).rejects.toThrow(TransactionStateError);
    });

    test('refuses to roll back before it began or to begin again after rolling back', async () => {
        const c = client();
        const tx = new TransactionCoordinator(c, silentLogger());
        await expect(tx.rollback()).rejects.toThrow('Cannot roll back a transaction in state IDLE');
        await tx.begin();
        await tx.rollback();
        expect(tx.current).toBe('ROLLED_BACK');
        await expect(tx.begin()).rejects.toThrow(TransactionStateError);
        expect(c.query.mock.calls.map((call) => call[0])).toEqual(['BEGIN', 'ROLLBACK']);
    });
});

describe('withTransaction', () => {
    test('commits and releases on success', async () => {
        const db = new MemoryDatabase();
        const result = await withTransaction(db, silentLogger(), async (client) => {
            await client.query('SELECT 1');
            return 'done';
        });

        expect(result).toBe('done');
        expect(db.statements).toEqual(['BEGIN', 'SELECT 1', 'COMMIT']);
        expect(db.releases).toBe(1);
    });

    test('rolls back, re-throws and still releases on failure', async () => {
        const db = new MemoryDatabase();
        const boom = new Error('boom');

        await expect(
            withTransaction(db, silentLogger(), async () => {
                throw boom;
            }),
        ).rejects.toBe(boom);

        expect(db.statements).toEqual(['BEGIN', 'ROLLBACK']);
        expect(db.releases).toBe(1);
    });

    test('a failed COMMIT is rolled back too', async () => {
        const db = new MemoryDatabase();
        db.failOn('COMMIT', new Error('could not serialize access'));

        await expect(withTransaction(db, silentLogger(), async () => 1)).rejects.toThrow('could not serialize access');
        expect(db.statements).toEqual(['BEGIN', 'COMMIT', 'ROLLBACK']);
    });

    test('a connection failure surfaces as ConnectionError before any statement', async () => {
        const refused = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:5432'), { code: 'ECONNREFUSED' });
        const source = { connect: jest.fn().mockRejectedValue(refused) };
        const work = jest.fn();

        await expect(withTransaction(source, silentLogger(), work)).rejects.toThrow(ConnectionError);
        expect(work).not.toHaveBeenCalled();
    });
});
