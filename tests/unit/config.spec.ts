import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { ConfigError, loadConfig } from '../../src/server/config.js';

describe('config', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 8002,
      host: '0.0.0.0',
      corsOrigins: ['http://localhost:5173'],
      store: { driver: 'mongo', snapshotPath: undefined, snapshotFlushMs: 2000 },
      mongo: { uri: 'mongodb://localhost:27017/', dbName: 'edu-connect', timeoutMs: 5000 },
      enrichment: { enabled: true, collection: 'lessons' },
      logging: { level: 'info', format: 'json' }
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '9000',
      TRACKING_STORE: 'memory',
      TRACKING_SNAPSHOT_PATH: 'data/snapshot.json',
      CORS_ORIGINS: 'http://a.test, http://b.test,',
      ENRICHMENT_ENABLED: 'false',
      LOG_LEVEL: 'DEBUG'
    });
    expect(config.port).toBe(9000);
    expect(config.store.driver).toBe('memory');
    expect(config.store.snapshotPath).toBe(path.resolve(process.cwd(), 'data/snapshot.json'));
    expect(config.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
    expect(config.enrichment.enabled).toBe(false);
    expect(config.logging.level).toBe('debug');
  });

  it('treats blank choices as unset', () => {
    const config = loadConfig({ TRACKING_STORE: '', LOG_LEVEL: ' ', LOG_FORMAT: '' });
    expect(config.store.driver).toBe('mongo');
    expect(config.logging).toEqual({ level: 'info', format: 'json' });
  });

  it('names the offending variable', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(/PORT: must be a positive integer/);
    expect(() => loadConfig({ PORT: '70000' })).toThrow(/PORT: must be a port between 1 and 65535/);
    expect(() => loadConfig({ ENRICHMENT_ENABLED: 'maybe' })).toThrow(ConfigError);
    expect(() => loadConfig({ TRACKING_STORE: 'redis' })).toThrow(/TRACKING_STORE/);
  });
});
