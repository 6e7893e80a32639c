/**
 * Geocoding Client
 * Resolves free-text place names through the Open-Meteo geocoding API
 */

import { z } from 'zod';
import { config } from '../config';
import { MalformedDataError, NotFoundError } from '../errors';
import { createHttpClient, ensureSuccess, toTransportError, type HttpClient } from '../utils/http';
import { createLogger, type Logger } from '../utils/logger';
import type { Coordinate, PlaceSuggestion } from './types';

const PROVIDER = 'Geocoding API';
const MIN_SUGGEST_LENGTH = 2;
const RESOLVE_RESULT_COUNT = 1;
// Fetch more than the cap so that duplicates dropped below still leave enough
const SUGGEST_FETCH_COUNT = 10;

const geocodingResultSchema = z.object({
    name: z.string(),
    latitude: z.number(),
    longitude: z.number(),
    country: z.string().optional(),
    admin1: z.string().optional(),
});

type GeocodingResult = z.infer<typeof geocodingResultSchema>;

// Entries are validated one by one so that one odd result does not hide the rest
const geocodingResponseSchema = z.object({
    results: z.array(z.unknown()).optional(),
});

export interface GeocodingClientOptions {
    http?: HttpClient;
    logger?: Logger;
    language?: string;
}

export class GeocodingClient {
    private readonly http: HttpClient;
    private readonly logger: Logger;
    private readonly language: string;

    constructor(options: GeocodingClientOptions = {}) {
        this.http = options.http ?? createHttpClient({
            baseURL: config.api.geocoding,
            timeoutMs: config.http.timeoutMs,
        });
        this.logger = options.logger ?? createLogger('GeocodingClient');
        this.language = options.language ?? config.geocoding.language;
    }

    /**
     * Resolve a place name to the coordinates of the provider's first match
     */
    async resolve(placeName: string): Promise<Coordinate> {
        const name = placeName.trim();
        if (!name) {
            throw new NotFoundError(placeName);
        }

        const results = await this.search(name, RESOLVE_RESULT_COUNT);
        const first = results[0];
        if (first === undefined) {
            this.logger.warn('No geocoding results found', { placeName: name });
            throw new NotFoundError(name);
        }

        const parsed = geocodingResultSchema.safeParse(first);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            const path = ['results', '0', ...(issue?.path ?? []).map(String)].join('.');
            throw new MalformedDataError(path, issue?.message ?? 'invalid geocoding result');
        }

        return { latitude: parsed.data.latitude, longitude: parsed.data.longitude };
    }

    /**
     * Autocomplete suggestions for a partial place name. Never throws.
     */
    async suggest(partialName: string, limit: number = config.geocoding.suggestionLimit): Promise<PlaceSuggestion[]> {
        const query = partialName.trim();
        if (query.length < MIN_SUGGEST_LENGTH || limit <= 0) {
            return [];
        }

        try {
            const results = await this.search(query, Math.max(limit, SUGGEST_FETCH_COUNT));
            const seen = new Set<string>();
            const suggestions: PlaceSuggestion[] = [];

            for (const raw of results) {
                const parsed = geocodingResultSchema.safeParse(raw);
                if (!parsed.success) {
                    this.logger.debug('Skipping malformed geocoding result', { query });
                    continue;
                }
                const suggestion = toSuggestion(parsed.data);
                if (seen.has(suggestion.displayName)) continue;
                seen.add(suggestion.displayName);
                suggestions.push(suggestion);
                if (suggestions.length >= limit) break;
            }

            return suggestions;
        } catch (error) {
            this.logger.warn('Autocomplete lookup failed', { error, query });
            return [];
        }
    }

    private async search(name: string, count: number): Promise<unknown[]> {
        const url = '/search';
        const params = { name, count, language: this.language, format: 'json' };

        let data: unknown;
        try {
            const response = await this.http.get<unknown>(url, { params });
            data = ensureSuccess(response, url, PROVIDER).data;
        } catch (error) {
            throw toTransportError(error, url, PROVIDER);
        }

        const parsed = geocodingResponseSchema.safeParse(data);
        if (!parsed.success) {
            throw new MalformedDataError('results', parsed.error.issues[0]?.message ?? 'unexpected response');
        }
        return parsed.data.results ?? [];
    }
}

function toSuggestion(result: GeocodingResult): PlaceSuggestion {
    const suggestion: PlaceSuggestion = { displayName: result.name };
    if (result.country) suggestion.country = result.country;
    if (result.admin1) suggestion.region = result.admin1;
    return suggestion;
}
