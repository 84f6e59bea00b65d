/**
 * Runs before every test file (vitest setupFiles).
 * Keeps winston quiet unless a test explicitly spies on it.
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';
process.env.SERVICE_NAME = process.env.SERVICE_NAME ?? 'keystone-backend-test';
