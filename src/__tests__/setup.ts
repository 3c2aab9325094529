/**
 * Jest setup: quiet logging and no file log during tests
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'error';
