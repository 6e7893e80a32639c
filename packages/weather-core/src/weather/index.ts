/**
 * Weather lookup: geocoding, forecast retrieval, parsing and display
 */

export * from './types';
export * from './units';
export * from './conditions';
export * from './geocoding-client';
export * from './forecast-client';
export * from './parser';
export * from './weather-service';
export * from './format';
