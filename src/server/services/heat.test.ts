import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createSeededRng } from '../../lib/random';
import { createTestDb, offlineFetch, testConfig, TEST_NOW } from '../testUtils';
import { calculateVulnerability, generateHeatGrid, getHeatDashboard, toTemperatureTrend } from './heat';
import { WeatherService } from './weather';

describe('generateHeatGrid', () => {
  const { city } = createTestDb();

  it('places points inside their area and clamps temperatures', () => {
    const grid = generateHeatGrid(city.heat, createSeededRng(1));
    expect(grid).toHaveLength(city.heat.areas.length * 20);

    for (const area of city.heat.areas) {
      const points = grid.filter(point => point.areaType === area.areaType);
      expect(points).toHaveLength(20);
      for (const point of points) {
        expect(point.latitude).toBeGreaterThanOrEqual(area.latRange[0]);
        expect(point.latitude).toBeLessThanOrEqual(area.latRange[1]);
        expect(point.longitude).toBeGreaterThanOrEqual(area.lonRange[0]);
        expect(point.longitude).toBeLessThanOrEqual(area.lonRange[1]);
        expect(point.temperature).toBeGreaterThanOrEqual(25);
        expect(point.temperature).toBeLessThanOrEqual(45);
      }
    }
  });

  it('is reproducible for a seed', () => {
    expect(generateHeatGrid(city.heat, createSeededRng(9), 3)).toEqual(generateHeatGrid(city.heat, createSeededRng(9), 3));
  });

  it('runs industrial areas hotter than green ones on average', () => {
    const grid = generateHeatGrid(city.heat, createSeededRng(3), 200);
    const mean = (type: string) => {
      const temps = grid.filter(point => point.areaType === type).map(point => point.temperature);
      return temps.reduce((sum, t) => sum + t, 0) / temps.length;
    };
    expect(mean('industrial')).toBeGreaterThan(mean('green') + 3);
  });
});

describe('calculateVulnerability', () => {
  it('ranks wards by weighted temperature, population and lack of green cover', () => {
    const { city } = createTestDb();
    expect(calculateVulnerability(city.heat.wards).map(({ ward, index, priority }) => ({ ward, index, priority }))).toEqual([
      { ward: 'East Zone', index: 1, priority: 'Critical' },
      { ward: 'Mahadevapura', index: 0.76, priority: 'Critical' },
      { ward: 'Bommanahalli', index: 0.49, priority: 'Medium' },
      { ward: 'Dasarahalli', index: 0.22, priority: 'Low' },
      { ward: 'Yelahanka', index: 0.06, priority: 'Low' },
    ]);
  });
});

describe('toTemperatureTrend', () => {
  it('averages the daily extremes', () => {
    expect(toTemperatureTrend([
      { date: '2026-06-15', temperatureMax: 33, temperatureMin: 22.5, precipitationSum: 0, windSpeedMax: 10, weatherCode: 1 },
    ])).toEqual([{ date: '2026-06-15', max: 33, min: 22.5, average: 27.8 }]);
  });
});

describe('getHeatDashboard', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('assembles the view from fallback readings when offline', async () => {
    const { db, city, guidance } = createTestDb();
    const weather = new WeatherService({ db, config: testConfig(), city, fetchFn: offlineFetch, now: () => TEST_NOW });

    const dashboard = await getHeatDashboard({ weather, city, guidance, rng: createSeededRng(5) }, 'water-board');

    expect(dashboard.current.source).toBe('fallback');
    expect(dashboard.uv.data).toEqual({ uvIndex: 8, riskLevel: 'Very High' });
    expect(dashboard.grid).toHaveLength(100);
    expect(dashboard.trend.source).toBe('fallback');
    expect(dashboard.trend.data[0]).toEqual({ date: '2026-06-15', max: 37.1, min: 25.3, average: 31.2 });
    expect(dashboard.zones).toHaveLength(6);
    expect(dashboard.islands.hotspots[0]).toMatchObject({ name: 'Electronic City', intensity: 4.2 });
    expect(dashboard.guidance).toEqual({ focus: 'General view of heat islands for BWSSB (Water Board).', actions: [] });
    db.close();
  });
});
