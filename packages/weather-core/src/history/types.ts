/**
 * Search history contract
 */

export interface HistoryRecord {
    city: string;
    temperatureCelsius: number;   // always Celsius, before any display conversion
    observedAt: string;           // provider timestamp
    recordedAt: Date;             // assigned by the store on insert
}

export type NewHistoryRecord = Omit<HistoryRecord, 'recordedAt'>;

/**
 * Append-only store of past searches. There is no update or delete.
 */
export interface SearchHistoryStore {
    append(record: NewHistoryRecord): Promise<HistoryRecord>;
    /** Most recently recorded first, at most HISTORY_MAX_ENTRIES */
    recent(limit?: number): Promise<HistoryRecord[]>;
    close(): Promise<void>;
}

export const HISTORY_MAX_ENTRIES = 50;

export type Clock = () => Date;

export function clampHistoryLimit(limit: number): number {
    if (!Number.isFinite(limit) || limit <= 0) return 0;
    return Math.min(HISTORY_MAX_ENTRIES, Math.floor(limit));
}
