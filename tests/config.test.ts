import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from '../src/config';

describe('loadConfig', () => {
  it('uses the defaults without environment variables', () => {
    const config = loadConfig({});
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.defaultTransferTime).toBe(180);
    expect(config.earthRadius).toBe(6371000);
    expect(config.assumedSpeed).toBe(10);
    expect(config.searchTimeout).toBeUndefined();
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      GTFS_DIRECTORY: '/tmp/feed',
      DEFAULT_TRANSFER_TIME: '120',
      ASSUMED_SPEED_MPS: '12.5',
      SEARCH_TIMEOUT_MS: '250',
      CORS_ORIGIN: 'http://localhost:3000',
    });
    expect(config.port).toBe(8080);
    expect(config.gtfsDirectory).toBe('/tmp/feed');
    expect(config.defaultTransferTime).toBe(120);
    expect(config.assumedSpeed).toBe(12.5);
    expect(config.searchTimeout).toBe(250);
    expect(config.corsOrigin).toBe('http://localhost:3000');
  });

  it('ignores values which are no positive numbers', () => {
    const config = loadConfig({
      PORT: 'abc',
      DEFAULT_TRANSFER_TIME: '0',
      ASSUMED_SPEED_MPS: '-5',
      SEARCH_TIMEOUT_MS: '',
    });
    expect(config.port).toBe(DEFAULT_CONFIG.port);
    expect(config.defaultTransferTime).toBe(180);
    expect(config.assumedSpeed).toBe(10);
    expect(config.searchTimeout).toBeUndefined();
  });
});
