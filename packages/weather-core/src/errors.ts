/**
 * Error taxonomy for weather lookups
 *
 * getWeather lets every one of these reach its caller unchanged. suggest and
 * recordSearch catch them and log instead.
 */

export type WeatherErrorKind = 'not_found' | 'transport' | 'malformed_data' | 'storage';

export abstract class WeatherError extends Error {
  abstract readonly kind: WeatherErrorKind;
}

/**
 * The place name resolved to no coordinates
 */
export class NotFoundError extends WeatherError {
  readonly kind = 'not_found';

  constructor(public readonly placeName: string) {
    super(placeName.trim() ? `Could not find coordinates for: ${placeName}` : 'Enter a city name to search for');
    this.name = 'NotFoundError';
  }
}

export interface TransportErrorDetails {
  url: string;
  status?: number;
  bodySnippet?: string;
  cause?: unknown;
}

/**
 * Network failure, timeout or non-2xx response
 */
export class TransportError extends WeatherError {
  readonly kind = 'transport';
  public readonly url: string;
  public readonly status?: number;
  public readonly bodySnippet?: string;

  constructor(message: string, details: TransportErrorDetails) {
    super(message);
    this.name = 'TransportError';
    this.url = details.url;
    this.status = details.status;
    this.bodySnippet = details.bodySnippet;
    this.cause = details.cause;
  }
}

/**
 * Provider payload did not match the expected structure
 */
export class MalformedDataError extends WeatherError {
  readonly kind = 'malformed_data';

  constructor(public readonly field: string, detail: string) {
    super(`Malformed weather data at ${field}: ${detail}`);
    this.name = 'MalformedDataError';
  }
}

/**
 * Search history could not be read or written
 */
export class StorageError extends WeatherError {
  readonly kind = 'storage';

  constructor(public readonly operation: 'open' | 'append' | 'recent' | 'close', cause: unknown) {
    super(`History ${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'StorageError';
    this.cause = cause;
  }
}

export function isWeatherError(value: unknown): value is WeatherError {
  return value instanceof WeatherError;
}
