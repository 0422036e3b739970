import { describe, expect, it } from 'vitest';
import { createSeededRng } from '../../lib/random';
import type { Lake } from '../../types';
import { createTestDb, TEST_NOW } from '../testUtils';
import { assessLake, getWaterDashboard, listLakes, simulateQualityTrend, toFloodZones } from './water';

describe('listLakes', () => {
  it('reads the seeded lakes in name order with their pollution sources', () => {
    const { db } = createTestDb();
    const lakes = listLakes(db);
    expect(lakes.map(lake => lake.name)).toEqual([
      'Agara Lake',
      'Bellandur Lake',
      'Hebbal Lake',
      'Sankey Tank',
      'Ulsoor Lake',
      'Varthur Lake',
    ]);
    expect(lakes[1]?.pollutionSources).toEqual(['Industrial effluent', 'Untreated sewage', 'Urban runoff']);
    db.close();
  });
});

describe('assessLake', () => {
  it('derives status, water quality and bloom risk', () => {
    const { db } = createTestDb();
    const bellandur = listLakes(db).find(lake => lake.id === 'lake-bellandur');
    expect(bellandur && assessLake(bellandur)).toMatchObject({
      status: 'Poor',
      color: 'red',
      waterQualityIndex: 40,
      algalBloomRisk: 'High',
    });
    db.close();
  });
});

describe('toFloodZones', () => {
  it('colours high-risk zones dark red', () => {
    const { city } = createTestDb();
    expect(toFloodZones(city.water.floodZones).map(zone => [zone.area, zone.color])).toEqual([
      ['Silk Board', 'darkred'],
      ['Electronic City', 'darkred'],
      ['Whitefield', 'orange'],
      ['Koramangala', 'orange'],
    ]);
  });
});

describe('simulateQualityTrend', () => {
  const lake: Lake = {
    id: 'lake-test',
    name: 'Test Lake',
    latitude: 12.9,
    longitude: 77.6,
    areaHectares: 10,
    healthScore: 5,
    pollutionLevel: 'Low',
    pollutionSources: [],
  };

  it('produces one score per day ending today', () => {
    const [trend] = simulateQualityTrend([lake], createSeededRng(2), 30, 0.4, TEST_NOW);
    expect(trend?.series).toHaveLength(30);
    expect(trend?.series[0]?.date).toBe('2026-05-17');
    expect(trend?.series[29]?.date).toBe('2026-06-15');
    expect(trend?.current).toBe(trend?.series[29]?.score);
  });

  it('keeps scores within 0 to 10', () => {
    const [trend] = simulateQualityTrend([{ ...lake, healthScore: 9.9 }], createSeededRng(4), 30, 2, TEST_NOW);
    for (const point of trend?.series ?? []) {
      expect(point.score).toBeGreaterThanOrEqual(0);
      expect(point.score).toBeLessThanOrEqual(10);
    }
  });

  it('reports a flat series as stable', () => {
    const [trend] = simulateQualityTrend([lake], createSeededRng(2), 30, 0, TEST_NOW);
    expect(trend).toMatchObject({ trend: 'Stable', slope: 0, current: 5, changeRate: 0 });
  });
});

describe('getWaterDashboard', () => {
  const build = (stakeholder: 'water-board' | 'citizens') => {
    const { db, city, guidance } = createTestDb();
    const dashboard = getWaterDashboard(
      { db, city, cityName: 'Bengaluru', guidance, rng: createSeededRng(8), now: () => TEST_NOW },
      stakeholder,
    );
    db.close();
    return dashboard;
  };

  it('shows supply figures to the water board only', () => {
    expect(build('water-board').supply?.map(tile => tile.label)).toEqual([
      'Daily Supply',
      'Groundwater Level',
      'Lake Storage',
      'Quality Score',
    ]);
    expect(build('citizens').supply).toBeNull();
  });

  it('validates the lake scores and attaches guidance', () => {
    const dashboard = build('water-board');
    expect(dashboard.validation).toEqual({ valid: true, warnings: [], errors: [] });
    expect(dashboard.qualityTrend).toHaveLength(6);
    expect(dashboard.criticalThreshold).toBe(5);
    expect(dashboard.guidance.focus).toBe('Monitor water quality, lake health, and supply sustainability.');
  });
});
