import { describe, expect, it } from 'vitest';
import { createTestDb } from '../testUtils';
import { classifyZone, getUrbanGrowthDashboard } from './urbanGrowth';

describe('urban growth', () => {
  const { db, city, guidance } = createTestDb();
  db.close();

  it('classifies zones by growth rate', () => {
    const zones = Object.fromEntries(city.growth.zones.map(zone => [zone.zone, classifyZone(zone)]));

    expect(zones['CBD']).toMatchObject({ status: 'Stable', color: 'green' });
    expect(zones['CBD']?.radius).toBeCloseTo(9.05);
    expect(zones['Whitefield']).toMatchObject({ status: 'Moderate Growth', color: 'yellow' });
    expect(zones['Electronic City']).toMatchObject({ status: 'High Growth', color: 'orange' });
    expect(zones['Yelahanka']).toMatchObject({ status: 'Rapid Growth', color: 'red' });
    expect(zones['Yelahanka']?.radius).toBeCloseTo(17.1);
  });

  it('ranks zone statistics by growth rate', () => {
    const dashboard = getUrbanGrowthDashboard(city, guidance, 'city-planning');
    expect(dashboard.growthStats.map(row => row.zone)).toEqual([
      'Yelahanka', 'Bannerghatta', 'Electronic City', 'Hebbal', 'Whitefield', 'Koramangala', 'Jayanagar', 'CBD',
    ]);
    expect(dashboard.zones).toHaveLength(8);
    expect(dashboard.metroLines).toHaveLength(3);
    expect(dashboard.landCover.urbanGrowthRate).toBe(12.3);
    expect(dashboard.guidance.focus).toBe('Monitor urban sprawl patterns and plan sustainable development corridors.');
  });

  it('leaves the source data in its original order', () => {
    getUrbanGrowthDashboard(city, guidance, 'citizens');
    expect(city.growth.growthStats[0]?.zone).toBe('Yelahanka');
    expect(city.growth.zones[0]?.zone).toBe('CBD');
  });
});
