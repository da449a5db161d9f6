/**
 * Root test setup file
 *
 * Runs before every test file. Silences the console transport; tests that
 * assert on logging spy on winstonLogger.
 */

process.env.NODE_ENV = 'test';
process.env.LOG_CONSOLE = 'false';
