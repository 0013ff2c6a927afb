import { describe, expect, it } from 'vitest';
import { loadConfig } from '../../../src/infrastructure/config/Config.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      server: { port: 8000 },
      data: { csvPath: 'data/cards_data.csv' },
      app: { environment: 'dev', title: 'Banking Transactions API', version: '1.0.0' },
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '3001',
      CSV_PATH: '/srv/cards.csv',
      APP_ENV: 'prod',
      API_TITLE: 'Cards',
      API_VERSION: '2.1.0',
    });

    expect(config.server.port).toBe(3001);
    expect(config.data.csvPath).toBe('/srv/cards.csv');
    expect(config.app).toEqual({ environment: 'prod', title: 'Cards', version: '2.1.0' });
  });

  it('rejects an unknown environment', () => {
    expect(() => loadConfig({ APP_ENV: 'staging' })).toThrow(/^Invalid configuration: APP_ENV: /);
  });

  it('rejects a port that is not a number', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(/^Invalid configuration: PORT: /);
  });
});
