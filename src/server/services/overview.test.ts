import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { AirQualityReading, WeatherReading } from '../../types';
import { createTestDb, offlineFetch, testConfig, TEST_NOW } from '../testUtils';
import { evaluateAlertRules, getOverviewDashboard } from './overview';
import { listLakes } from './water';
import { WeatherService } from './weather';

const mildWeather: WeatherReading = {
  temperature: 27,
  humidity: 50,
  apparentTemperature: null,
  weatherCode: null,
  windSpeed: null,
  windDirection: null,
  heatIndex: 27,
  observedAt: TEST_NOW.toISOString(),
};

const cleanAir: AirQualityReading = {
  aqi: 42,
  pm25: 10,
  pm10: 20,
  no2: 10,
  so2: 5,
  o3: 20,
  co: 0.3,
  dominantPollutant: 'pm25',
  category: 'Good',
  observedAt: TEST_NOW.toISOString(),
};

describe('overview', () => {
  let env: ReturnType<typeof createTestDb>;

  beforeEach(() => {
    env = createTestDb();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    env.db.close();
    vi.restoreAllMocks();
  });

  describe('evaluateAlertRules', () => {
    it('stays quiet when every reading is within limits', () => {
      const lakes = listLakes(env.db).filter(lake => lake.healthScore >= 4);
      expect(evaluateAlertRules({ cityName: 'Bengaluru', weather: mildWeather, airQuality: cleanAir, lakes }, TEST_NOW)).toEqual([]);
    });

    it('fires at the heat index threshold but not the AQI one', () => {
      const alerts = evaluateAlertRules(
        { cityName: 'Bengaluru', weather: { ...mildWeather, heatIndex: 40 }, airQuality: { ...cleanAir, aqi: 150 }, lakes: [] },
        TEST_NOW,
      );
      expect(alerts).toEqual([
        {
          id: 'rule-heat',
          type: 'Heat Wave',
          location: 'Bengaluru',
          severity: 'High',
          createdAt: '2026-06-15T12:00:00.000Z',
          origin: 'rule',
        },
      ]);
    });
  });

  it('builds the dashboard from fallback readings when offline', async () => {
    const weather = new WeatherService({
      db: env.db,
      config: testConfig(),
      city: env.city,
      fetchFn: offlineFetch,
      rng: () => 0.5,
      now: () => TEST_NOW,
    });
    const dashboard = await getOverviewDashboard(
      { db: env.db, weather, city: env.city, cityInfo: testConfig().city, guidance: env.guidance, now: () => TEST_NOW },
      'parks',
    );

    expect(dashboard.weather.source).toBe('fallback');
    expect(dashboard.metrics).toEqual([
      { label: 'Average Temperature', value: '32.5°C', delta: '+2.1°C' },
      { label: 'Lake Health Index', value: '5.4/10', delta: '3 below threshold' },
      { label: 'Air Quality Index', value: '157', delta: 'Poor' },
      { label: 'Green Cover', value: '18.2%', delta: '-1.3%' },
    ]);
    expect(dashboard.alerts.map(alert => alert.id)).toEqual([
      'rule-aqi', 'rule-heat', 'rule-lake-bellandur', 'alert-001', 'alert-002', 'alert-003', 'alert-004',
    ]);
    expect(dashboard.alerts[3]).toEqual({
      id: 'alert-001',
      type: 'Heat Wave',
      location: 'Electronic City',
      severity: 'High',
      createdAt: '2026-06-15T10:00:00.000Z',
      origin: 'seed',
    });
    expect(dashboard.validation).toEqual({ valid: true, warnings: [], errors: [] });
    expect(dashboard.lastUpdated).toBe('2026-06-15T12:00:00.000Z');
    expect(dashboard.guidance.focus).toBe('Find wards where added green cover gives the largest cooling benefit.');
  });
});
