import { connect, ConnectionSource, TransactionClient } from './index';
import { TransactionStateError } from '../lib/errors';
import type { Logger } from '../lib/logger';

export type TransactionState = 'IDLE' | 'OPEN' | 'COMMITTED' | 'ROLLED_BACK';

/**
 * Owns the single client of a load run. A run opens exactly one transaction;
 * every batch it writes lands in it, and it ends either committed or rolled back.
 */
export class TransactionCoordinator {
    private state: TransactionState = 'IDLE';

    constructor(private readonly client: TransactionClient, private readonly logger: Logger) {}

    get current(): TransactionState {
        return this.state;
    }

    async begin(): Promise<void> {
        this.expect('IDLE', 'begin');
        await this.client.query('BEGIN');
        this.state = 'OPEN';
        this.logger.debug('Transaction opened');
    }

    async commit(): Promise<void> {
        this.expect('OPEN', 'commit');
        await this.client.query('COMMIT');
        this.state = 'COMMITTED';
        this.logger.debug('Transaction committed');
    }

    async rollback(): Promise<void> {
        this.expect('OPEN', 'roll back');
        // A failed ROLLBACK still leaves nothing committed; the server discards
        // the transaction when the connection goes.
        this.state = 'ROLLED_BACK';
        await this.client.query('ROLLBACK');
        this.logger.warn('Transaction rolled back');
    }

    private expect(state: TransactionState, action: string): void {
        if (this.state !== state) {
            throw new TransactionStateError(`Cannot ${action} a transaction in state ${this.state}`);
        }
    }
}

/**
 * Runs `work` inside one transaction on a freshly acquired client. Any error
 * thrown by `work` rolls the whole run back and is re-thrown; the client is
 * released whatever happens.
 */
export const withTransaction = async <T>(
    source: ConnectionSource,
    logger: Logger,
    work: (db: TransactionClient) => Promise<T>,
): Promise<T> => {
    const client = await connect(source);
    const tx = new TransactionCoordinator(client, logger);
    try {
        await tx.begin();
        const result = await work(client);
        await tx.commit();
        return result;
    } catch (err) {
        if (tx.current === 'OPEN') {
            try {
                await tx.rollback();
            } catch (rollbackErr) {
                logger.error({ err: rollbackErr }, 'Rollback failed');
            }
        }
        throw err;
    } finally {
        client.release();
    }
};
