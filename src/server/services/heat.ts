import { getVulnerabilityPriority, minMaxNormalize } from '../../lib/metrics';
import { clamp, normal, round, uniform, type Rng } from '../../lib/random';
import type {
  DailyForecast,
  HeatDashboard,
  HeatPoint,
  StakeholderId,
  TemperatureTrendPoint,
  WardVulnerability,
} from '../../types';
import type { CityData, GuidanceTable } from '../data/cityData';
import { getStakeholderGuidance } from './guidance';
import type { WeatherService } from './weather';

const POINTS_PER_AREA = 20;

/** Simulated land-surface temperatures: uniform positions inside each area, normal offsets per area type. */
export function generateHeatGrid(heat: CityData['heat'], rng: Rng, pointsPerArea = POINTS_PER_AREA): HeatPoint[] {
  return heat.areas.flatMap(area =>
    Array.from({ length: pointsPerArea }, () => ({
      latitude: round(uniform(rng, area.latRange[0], area.latRange[1]), 4),
      longitude: round(uniform(rng, area.lonRange[0], area.lonRange[1]), 4),
      areaType: area.areaType,
      temperature: round(clamp(heat.baseTemperature + normal(rng, area.offset, area.sd), 25, 45), 1),
    })),
  );
}

/**
 * Weighted heat vulnerability per ward: 0.4·temperature + 0.35·population + 0.25·(1 − green cover),
 * each min–max normalised across wards. Highest first.
 */
export function calculateVulnerability(wards: CityData['heat']['wards']): WardVulnerability[] {
  const temperature = minMaxNormalize(wards.map(w => w.averageTemperature));
  const population = minMaxNormalize(wards.map(w => w.population));
  const greenCover = minMaxNormalize(wards.map(w => w.greenCover));

  return wards
    .map((ward, i) => {
      const index = 0.4 * temperature[i] + 0.35 * population[i] + 0.25 * (1 - greenCover[i]);
      return { ...ward, index: round(index, 2), priority: getVulnerabilityPriority(index) };
    })
    .sort((a, b) => b.index - a.index);
}

export const toTemperatureTrend = (forecast: DailyForecast[]): TemperatureTrendPoint[] =>
  forecast.map(day => ({
    date: day.date,
    max: day.temperatureMax,
    min: day.temperatureMin,
    average: round((day.temperatureMax + day.temperatureMin) / 2, 1),
  }));

export interface HeatServiceDeps {
  weather: WeatherService;
  city: CityData;
  guidance: GuidanceTable;
  rng: Rng;
}

export async function getHeatDashboard(deps: HeatServiceDeps, stakeholder: StakeholderId): Promise<HeatDashboard> {
  const [current, uv, forecast] = await Promise.all([
    deps.weather.getCurrentWeather(),
    deps.weather.getUvIndex(),
    deps.weather.getForecast(7),
  ]);

  return {
    current,
    uv,
    grid: generateHeatGrid(deps.city.heat, deps.rng),
    zones: deps.city.heat.zones,
    trend: { ...forecast, data: toTemperatureTrend(forecast.data) },
    vulnerability: calculateVulnerability(deps.city.heat.wards),
    islands: deps.city.heat.islands,
    guidance: getStakeholderGuidance(deps.guidance, 'heat', stakeholder),
  };
}
