import { describe, expect, it } from 'vitest';
import { loadConfig } from './config';

describe('loadConfig', () => {
  it('falls back to defaults for the city and upstream APIs', () => {
    const config = loadConfig({});
    expect(config.port).toBe(3000);
    expect(config.env).toBe('development');
    expect(config.city).toEqual({ name: 'Bengaluru', latitude: 12.9716, longitude: 77.5946, timezone: 'Asia/Kolkata' });
    expect(config.openMeteo).toEqual({
      forecastUrl: 'https://api.open-meteo.com/v1',
      airQualityUrl: 'https://air-quality-api.open-meteo.com/v1',
    });
    expect(config.http).toEqual({ timeoutMs: 10000, maxRetries: 3, backoffMs: 1000 });
    expect(config.gemini).toEqual({ apiKey: null, model: 'gemini-2.5-flash' });
    expect(config.snapshotMaxAgeMinutes).toBe(180);
  });

  it('coerces numeric variables', () => {
    const config = loadConfig({ PORT: '8080', HTTP_MAX_RETRIES: '0', CITY_LATITUDE: '13.1' });
    expect(config.port).toBe(8080);
    expect(config.http.maxRetries).toBe(0);
    expect(config.city.latitude).toBe(13.1);
  });

  it('treats empty strings as unset', () => {
    const config = loadConfig({ GEMINI_API_KEY: '', PORT: '' });
    expect(config.gemini.apiKey).toBeNull();
    expect(config.port).toBe(3000);
  });

  it('reads the assistant key', () => {
    expect(loadConfig({ GEMINI_API_KEY: 'test-secret' }).gemini.apiKey).toBe('test-secret');
  });

  it('lists every invalid variable', () => {
    expect(() => loadConfig({ PORT: 'abc', NODE_ENV: 'staging' })).toThrow(/^Invalid configuration: PORT: .+; NODE_ENV: .+$/);
  });
});
