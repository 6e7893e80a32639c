// Main entry point for @skycast/weather-core

// Export config
export * from './config';

// Export error taxonomy
export * from './errors';

// Export logging and HTTP utilities
export * from './utils';

// Export Weather module
export * from './weather';

// Export search history stores
export * from './history';
