/**
 * Runs before every test file (vitest setupFiles).
 * Keeps test output quiet and pins the environment the app code branches on.
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';
