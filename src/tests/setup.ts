/**
 * Test environment setup
 * Runs before each test file, before any application module is loaded
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.LOGGER_TYPE = 'console';
process.env.METRICS_TYPE = 'noop';
