/**
 * Vitest setup file
 */

// Keep pino quiet unless a test injects its own logger
process.env.NODE_ENV = 'test'
process.env.LOG_LEVEL = process.env.DEBUG_TESTS ? 'debug' : 'silent'
