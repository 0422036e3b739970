import { getGrowthStatus } from '../../lib/metrics';
import type { DevelopmentZone, StakeholderId, UrbanGrowthDashboard, ZoneGrowth } from '../../types';
import type { CityData, GuidanceTable } from '../data/cityData';
import { getStakeholderGuidance } from './guidance';

export const classifyZone = (zone: DevelopmentZone): ZoneGrowth => ({ ...zone, ...getGrowthStatus(zone.growthRate) });

export function getUrbanGrowthDashboard(city: CityData, guidance: GuidanceTable, stakeholder: StakeholderId): UrbanGrowthDashboard {
  const { growth } = city;
  return {
    zones: growth.zones.map(classifyZone),
    metroLines: growth.metroLines,
    growthStats: [...growth.growthStats].sort((a, b) => b.growthRate - a.growthRate),
    development: growth.development,
    landUse: growth.landUse,
    infrastructure: growth.infrastructure,
    hotspots: growth.hotspots,
    landCover: growth.landCover,
    guidance: getStakeholderGuidance(guidance, 'growth', stakeholder),
  };
}
