// Formatting utilities
export * from './formatters';

// Logger
export * from './logger';
