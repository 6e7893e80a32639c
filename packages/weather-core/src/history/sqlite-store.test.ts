/**
 * SqliteHistoryStore tests against in-memory and temporary SQLite files
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { StorageError } from '../errors';
import { SqliteHistoryStore } from './sqlite-store';

function steppingClock(start: string) {
    let tick = 0;
    return () => new Date(new Date(start).getTime() + 1000 * tick++);
}

describe('SqliteHistoryStore', () => {
    let store: SqliteHistoryStore;

    beforeEach(async () => {
        store = await SqliteHistoryStore.open({ path: ':memory:', clock: steppingClock('2025-04-04T12:00:00.000Z') });
    });

    afterEach(async () => {
        await store.close();
    });

    it('should assign recordedAt on append', async () => {
        const record = await store.append({ city: 'Lisbon', temperatureCelsius: 21.3, observedAt: '2025-04-04T14:00' });

        expect(record).toEqual({
            city: 'Lisbon',
            temperatureCelsius: 21.3,
            observedAt: '2025-04-04T14:00',
            recordedAt: new Date('2025-04-04T12:00:00.000Z'),
        });
        await expect(store.recent()).resolves.toEqual([record]);
    });

    it('should return the 50 most recent of 60 records, newest first', async () => {
        for (let i = 1; i <= 60; i++) {
            await store.append({ city: `R${i}`, temperatureCelsius: i / 10, observedAt: `2025-04-04T${String(i % 24).padStart(2, '0')}:00` });
        }

        const recent = await store.recent(50);

        expect(recent).toHaveLength(50);
        expect(recent[0].city).toBe('R60');
        expect(recent[49].city).toBe('R11');
        expect(recent.map((r) => r.city)).toEqual(Array.from({ length: 50 }, (_, i) => `R${60 - i}`));
    });

    it('should order by insertion even when recordedAt ties', async () => {
        const fixed = await SqliteHistoryStore.open({ path: ':memory:', clock: () => new Date('2025-04-04T12:00:00.000Z') });
        await fixed.append({ city: 'First', temperatureCelsius: 1, observedAt: 't1' });
        await fixed.append({ city: 'Second', temperatureCelsius: 2, observedAt: 't2' });

        const recent = await fixed.recent();
        await fixed.close();

        expect(recent.map((r) => r.city)).toEqual(['Second', 'First']);
    });

    it('should bound the limit to 0..50', async () => {
        for (let i = 1; i <= 55; i++) {
            await store.append({ city: `C${i}`, temperatureCelsius: 0, observedAt: 't' });
        }

        await expect(store.recent(0)).resolves.toEqual([]);
        await expect(store.recent(-3)).resolves.toEqual([]);
        await expect(store.recent(100)).resolves.toHaveLength(50);
        expect((await store.recent(2.9)).map((r) => r.city)).toEqual(['C55', 'C54']);
    });

    it('should keep negative and fractional Celsius values exactly', async () => {
        await store.append({ city: 'Tromsø', temperatureCelsius: -12.7, observedAt: '2025-01-06T09:00' });

        const [record] = await store.recent(1);
        expect(record.temperatureCelsius).toBe(-12.7);
        expect(record.city).toBe('Tromsø');
    });

    it('should fail with StorageError once closed', async () => {
        await store.close();

        await expect(store.append({ city: 'Lisbon', temperatureCelsius: 21.3, observedAt: 't' })).rejects.toBeInstanceOf(StorageError);
        await expect(store.recent()).rejects.toMatchObject({ name: 'StorageError', operation: 'recent' });
    });

    it('should fail with StorageError when the database cannot be opened', async () => {
        const missingDir = path.join(os.tmpdir(), `weather-missing-${Date.now()}`, 'nested', 'weather.db');

        await expect(SqliteHistoryStore.open({ path: missingDir })).rejects.toMatchObject({
            name: 'StorageError',
            operation: 'open',
        });
    });

    it('should keep every record from concurrent appends', async () => {
        const cities = Array.from({ length: 20 }, (_, i) => `City${i + 1}`);

        await Promise.all(cities.map((city, i) => store.append({ city, temperatureCelsius: i, observedAt: 't' })));

        const recent = await store.recent();
        expect(recent).toHaveLength(20);
        expect(new Set(recent.map((r) => r.city)).size).toBe(20);
        expect(recent.map((r) => r.city).sort()).toEqual([...cities].sort());
    });

    it('should treat a second close as a no-op', async () => {
        await store.close();

        await expect(store.close()).resolves.toBeUndefined();
    });

    it('should write each append to the file before close', async () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'weather-history-'));
        const dbPath = path.join(dir, 'weather.db');
        try {
            const writer = await SqliteHistoryStore.open({ path: dbPath });
            await writer.append({ city: 'Porto', temperatureCelsius: 18.4, observedAt: '2025-04-04T15:00' });

            const reader = await SqliteHistoryStore.open({ path: dbPath });
            const recent = await reader.recent();
            await reader.close();
            await writer.close();

            expect(recent.map((r) => r.city)).toEqual(['Porto']);
        } finally {
            fs.rmSync(dir, { recursive: true, force: true });
        }
    });

    it('should persist records across reopen of the same file', async () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'weather-history-'));
        const dbPath = path.join(dir, 'weather.db');
        try {
            const first = await SqliteHistoryStore.open({ path: dbPath });
            await first.append({ city: 'Lisbon', temperatureCelsius: 21.3, observedAt: '2025-04-04T14:00' });
            await first.close();

            const second = await SqliteHistoryStore.open({ path: dbPath });
            const recent = await second.recent();
            await second.close();

            expect(recent.map((r) => r.city)).toEqual(['Lisbon']);
        } finally {
            fs.rmSync(dir, { recursive: true, force: true });
        }
    });
});
