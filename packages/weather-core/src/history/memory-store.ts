import { config } from '../config';
import { StorageError } from '../errors';
import {
    clampHistoryLimit,
    type Clock,
    type HistoryRecord,
    type NewHistoryRecord,
    type SearchHistoryStore,
} from './types';

/**
 * In-process history store. Nothing survives a restart.
 */
export class InMemoryHistoryStore implements SearchHistoryStore {
    private readonly records: HistoryRecord[] = [];
    private closed = false;

    constructor(private readonly clock: Clock = () => new Date()) {}

    async append(record: NewHistoryRecord): Promise<HistoryRecord> {
        if (this.closed) {
            throw new StorageError('append', new Error('store is closed'));
        }
        const stored: HistoryRecord = { ...record, recordedAt: this.clock() };
        this.records.push(stored);
        return { ...stored };
    }

    async recent(limit: number = config.history.limit): Promise<HistoryRecord[]> {
        if (this.closed) {
            throw new StorageError('recent', new Error('store is closed'));
        }
        const bounded = clampHistoryLimit(limit);
        if (bounded === 0) return [];
        return this.records
            .slice(-bounded)
            .reverse()
            .map((record) => ({ ...record }));
    }

    async close(): Promise<void> {
        this.closed = true;
    }
}
