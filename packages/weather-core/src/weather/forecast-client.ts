/**
 * Forecast Client
 * Fetches current conditions and the daily block from Open-Meteo
 */

import { config } from '../config';
import { createHttpClient, ensureSuccess, toTransportError, type HttpClient } from '../utils/http';
import { createLogger, type Logger } from '../utils/logger';
import type { Coordinate } from './types';

const PROVIDER = 'Forecast API';
const DAILY_FIELDS = ['temperature_2m_max', 'temperature_2m_min', 'weathercode'];

export interface ForecastClientOptions {
    http?: HttpClient;
    logger?: Logger;
}

export class ForecastClient {
    private readonly http: HttpClient;
    private readonly logger: Logger;

    constructor(options: ForecastClientOptions = {}) {
        this.http = options.http ?? createHttpClient({
            baseURL: config.api.forecast,
            timeoutMs: config.http.timeoutMs,
        });
        this.logger = options.logger ?? createLogger('ForecastClient');
    }

    /**
     * Fetch the raw forecast payload for a coordinate. The body is returned
     * unparsed; WeatherDataParser owns its interpretation.
     */
    async fetch(coord: Coordinate): Promise<string> {
        const url = '/forecast';
        const params = {
            latitude: coord.latitude,
            longitude: coord.longitude,
            current_weather: true,
            daily: DAILY_FIELDS.join(','),
            timezone: 'auto',
        };

        try {
            const response = await this.http.get<string>(url, { params, responseType: 'text' });
            ensureSuccess(response, url, PROVIDER);
            this.logger.debug('Forecast fetched', { latitude: coord.latitude, longitude: coord.longitude });
            return typeof response.data === 'string' ? response.data : JSON.stringify(response.data);
        } catch (error) {
            const transportError = toTransportError(error, url, PROVIDER);
            this.logger.warn('Weather fetch failed', {
                status: transportError.status,
                latitude: coord.latitude,
                longitude: coord.longitude,
            });
            throw transportError;
        }
    }
}
