/**
 * Jest test setup file
 *
 * Runs before every suite. Keeps engine logging quiet unless a test
 * raises the level itself.
 */

process.env['LOG_LEVEL'] = process.env['LOG_LEVEL'] ?? 'ERROR';

jest.setTimeout(30000);

beforeAll(() => {
  jest.spyOn(console, 'warn').mockImplementation(() => {});
});

afterAll(() => {
  jest.restoreAllMocks();
});
