/**
 * Weather Service
 * Geocoding → forecast → parser, with optional best-effort search history
 */

import type { HistoryRecord, SearchHistoryStore } from '../history/types';
import { createLogger, type Logger } from '../utils/logger';
import { ForecastClient } from './forecast-client';
import { GeocodingClient } from './geocoding-client';
import { WeatherDataParser } from './parser';
import type { WeatherSnapshot } from './types';

export type PlaceResolver = Pick<GeocodingClient, 'resolve'>;
export type ForecastSource = Pick<ForecastClient, 'fetch'>;

export interface WeatherServiceOptions {
    geocoding?: PlaceResolver;
    forecast?: ForecastSource;
    parser?: WeatherDataParser;
    historyStore?: SearchHistoryStore;
    logger?: Logger;
}

export class WeatherService {
    private readonly geocoding: PlaceResolver;
    private readonly forecast: ForecastSource;
    private readonly parser: WeatherDataParser;
    private readonly historyStore?: SearchHistoryStore;
    private readonly logger: Logger;

    constructor(options: WeatherServiceOptions = {}) {
        this.logger = options.logger ?? createLogger('WeatherService');
        this.geocoding = options.geocoding ?? new GeocodingClient();
        this.forecast = options.forecast ?? new ForecastClient();
        this.parser = options.parser ?? new WeatherDataParser();
        this.historyStore = options.historyStore;
    }

    /**
     * Look up current conditions and the daily forecast for a place.
     * NotFoundError, TransportError and MalformedDataError reach the caller as thrown.
     */
    async getWeather(placeName: string): Promise<WeatherSnapshot> {
        const location = placeName.trim();
        this.logger.debug('Weather lookup started', { location });

        const coord = await this.geocoding.resolve(location);
        const payload = await this.forecast.fetch(coord);
        const snapshot = this.parser.parse(payload, location);

        this.logger.info('Weather lookup completed', {
            location,
            latitude: coord.latitude,
            longitude: coord.longitude,
            days: snapshot.days.length,
        });
        return snapshot;
    }

    /**
     * Append the snapshot's Celsius reading to history. Failures are logged and
     * reported as null; they never affect the snapshot already returned.
     */
    async recordSearch(
        snapshot: WeatherSnapshot,
        store: SearchHistoryStore | undefined = this.historyStore
    ): Promise<HistoryRecord | null> {
        if (!store) {
            return null;
        }

        try {
            return await store.append({
                city: snapshot.location,
                temperatureCelsius: snapshot.current.temperatureCelsius,
                observedAt: snapshot.current.observedAt,
            });
        } catch (error) {
            this.logger.error('Failed to record search', { error, location: snapshot.location });
            return null;
        }
    }

    /**
     * getWeather followed by recordSearch against the configured store
     */
    async searchAndRecord(placeName: string): Promise<WeatherSnapshot> {
        const snapshot = await this.getWeather(placeName);
        await this.recordSearch(snapshot);
        return snapshot;
    }

    /**
     * Recent searches from the configured store. StorageError propagates so the
     * caller can decide how to show unavailable history.
     */
    async recentSearches(limit?: number): Promise<HistoryRecord[]> {
        if (!this.historyStore) {
            return [];
        }
        return this.historyStore.recent(limit);
    }
}
