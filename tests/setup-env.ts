/**
 * Jest Environment Setup
 * Runs BEFORE the test framework is installed, and before any module reads
 * configuration.
 */

// Set test environment variables
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
