/**
 * Jest setup file.
 * Keep pino quiet during tests; lib/config reads LOG_LEVEL at import time,
 * so this has to run before any test module loads.
 */

process.env.LOG_LEVEL = process.env.TEST_LOG_LEVEL || 'silent';
delete process.env.DNS_SERVERS;
delete process.env.DNS_TIMEOUT_MS;

export {};
