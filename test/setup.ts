/**
 * Test Setup
 *
 * Environment is fixed at module level, before any module under test is
 * imported, so no developer .env value leaks into a run.
 */

process.env['NODE_ENV'] = 'test';
process.env['LOG_LEVEL'] = 'fatal';
delete process.env['DATABRICKS_API_TOKEN'];
delete process.env['DATABRICKS_ENDPOINT_URL'];
delete process.env['PUBLIC_DIR'];
delete process.env['CORS_ORIGIN'];

import { afterEach, vi } from 'vitest';

afterEach(() => {
  vi.unstubAllGlobals();
  vi.unstubAllEnvs();
});
