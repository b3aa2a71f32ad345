/**
 * API Configuration Tests
 *
 * @module @docpilot/api/tests/unit/config
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { loadApiConfig } from '../../src/config';

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('loadApiConfig', () => {
  it('should apply defaults', () => {
    expect(loadApiConfig({})).toEqual({
      PORT: 8080,
      QUERY_MAX_CONCURRENT: 10,
      QUERY_MAX_QUEUE: 30,
      QUERY_QUEUE_TIMEOUT_MS: 60000,
      INGEST_RUN_ON_START: false,
    });
  });

  it('should coerce numbers and the start-up flag', () => {
    const config = loadApiConfig({ PORT: '3000', QUERY_MAX_QUEUE: '0', INGEST_RUN_ON_START: 'true' });

    expect(config.PORT).toBe(3000);
    expect(config.QUERY_MAX_QUEUE).toBe(0);
    expect(config.INGEST_RUN_ON_START).toBe(true);
  });

  it('should reject an out-of-range port', () => {
    expect(() => loadApiConfig({ PORT: '70000' })).toThrow(
      'Invalid api configuration:\n  - PORT: Number must be less than or equal to 65535'
    );
  });

  it('should reject a flag that is not true or false', () => {
    expect(() => loadApiConfig({ INGEST_RUN_ON_START: 'yes' })).toThrow(
      'Invalid api configuration:\n  - INGEST_RUN_ON_START:'
    );
  });
});
