import { z } from 'zod';
import {
  assessAlgalBloomRisk,
  calculateWaterQualityIndex,
  classifyTrend,
  getLakeHealthStatus,
  linearTrend,
  validateEnvironmentalData,
} from '../../lib/metrics';
import { clamp, normal, round, type Rng } from '../../lib/random';
import type { FloodZone, Lake, LakeAssessment, LakeTrend, PollutionLevel, StakeholderId, WaterDashboard } from '../../types';
import type { CityData, GuidanceTable } from '../data/cityData';
import type { Db } from '../db';
import { getStakeholderGuidance } from './guidance';

const ONE_DAY_MS = 24 * 60 * 60 * 1000;

const SourcesSchema = z.array(z.string());

interface LakeRow {
  id: string;
  name: string;
  latitude: number;
  longitude: number;
  area_hectares: number;
  health_score: number;
  pollution_level: PollutionLevel;
  pollution_sources: string;
}

function parseSources(raw: string): string[] {
  const parsed = SourcesSchema.safeParse(JSON.parse(raw));
  return parsed.success ? parsed.data : [];
}

export function listLakes(db: Db): Lake[] {
  return db
    .prepare<[], LakeRow>('SELECT * FROM lakes ORDER BY name')
    .all()
    .map(row => ({
      id: row.id,
      name: row.name,
      latitude: row.latitude,
      longitude: row.longitude,
      areaHectares: row.area_hectares,
      healthScore: row.health_score,
      pollutionLevel: row.pollution_level,
      pollutionSources: parseSources(row.pollution_sources),
    }));
}

export function assessLake(lake: Lake): LakeAssessment {
  const { status, color } = getLakeHealthStatus(lake.healthScore);
  return {
    ...lake,
    status,
    color,
    waterQualityIndex: calculateWaterQualityIndex(lake.pollutionSources.length),
    algalBloomRisk: assessAlgalBloomRisk(lake.areaHectares),
  };
}

export const toFloodZones = (zones: CityData['water']['floodZones']): FloodZone[] =>
  zones.map(zone => ({ ...zone, color: zone.risk === 'High' ? 'darkred' : 'orange' }));

/** Simulated daily health scores ending today, with the least-squares trend of the series. */
export function simulateQualityTrend(lakes: Lake[], rng: Rng, days: number, sd: number, now: Date): LakeTrend[] {
  const start = now.getTime() - (days - 1) * ONE_DAY_MS;
  return lakes.map(lake => {
    const series = Array.from({ length: days }, (_, i) => ({
      date: new Date(start + i * ONE_DAY_MS).toISOString().slice(0, 10),
      score: round(clamp(normal(rng, lake.healthScore, sd), 0, 10), 2),
    }));
    const slope = linearTrend(series.map(point => point.score));
    return {
      lake: lake.name,
      series,
      trend: classifyTrend(slope),
      slope: round(slope, 4),
      current: series[series.length - 1]?.score ?? lake.healthScore,
      changeRate: round(slope * days, 2),
    };
  });
}

export interface WaterServiceDeps {
  db: Db;
  city: CityData;
  cityName: string;
  guidance: GuidanceTable;
  rng: Rng;
  now: () => Date;
}

export function getWaterDashboard(deps: WaterServiceDeps, stakeholder: StakeholderId): WaterDashboard {
  const { water } = deps.city;
  const lakes = listLakes(deps.db);

  return {
    lakes: lakes.map(assessLake),
    floodZones: toFloodZones(water.floodZones),
    floodRisk: water.floodRisk,
    qualityTrend: simulateQualityTrend(lakes, deps.rng, water.trendDays, water.trendSd, deps.now()),
    criticalThreshold: water.criticalThreshold,
    supply: stakeholder === 'water-board' ? water.supply : null,
    validation: validateEnvironmentalData({
      city: deps.cityName,
      lakes: lakes.map(lake => ({ name: lake.name, healthScore: lake.healthScore })),
    }),
    guidance: getStakeholderGuidance(deps.guidance, 'water', stakeholder),
  };
}
