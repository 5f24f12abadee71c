/**
 * Jest test setup file
 *
 * Runs before each test file to configure the test environment.
 */

// Keep conversion logs out of test output unless asked for
process.env['LOG_LEVEL'] = process.env['LOG_LEVEL'] ?? 'ERROR';

jest.setTimeout(30000);
