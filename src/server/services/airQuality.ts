import { getAqiStatus } from '../../lib/aqi';
import { percentile } from '../../lib/metrics';
import { normal, round, type Rng } from '../../lib/random';
import type { AirQualityDashboard, AirStation, PollutionHotspot, StakeholderId, StationStatus } from '../../types';
import type { CityData, GuidanceTable } from '../data/cityData';
import type { Db } from '../db';
import { getStakeholderGuidance } from './guidance';
import type { WeatherService } from './weather';

interface StationRow {
  id: string;
  name: string;
  latitude: number;
  longitude: number;
  aqi: number;
  pm25: number;
  pm10: number;
  no2: number;
  station_type: string;
}

export function listStations(db: Db): AirStation[] {
  return db
    .prepare<[], StationRow>('SELECT * FROM air_quality_stations ORDER BY aqi DESC')
    .all()
    .map(({ station_type, ...row }) => ({ ...row, stationType: station_type }));
}

export const withCategory = (station: AirStation): StationStatus => ({
  ...station,
  category: getAqiStatus(station.aqi).label,
});

/**
 * Simulated daily NO2 columns per zone. The latest value above the zone's
 * 75th percentile marks a hotspot; above the 90th it is High.
 */
export function detectPollutionHotspots(zones: CityData['air']['pollutionZones'], rng: Rng, days: number): PollutionHotspot[] {
  const hotspots: PollutionHotspot[] = [];
  for (const zone of zones) {
    const series = Array.from({ length: days }, () => normal(rng, zone.mean, zone.sd));
    const latest = series[series.length - 1];
    if (latest === undefined) continue;
    const p75 = percentile(series, 75);
    if (latest <= p75) continue;
    hotspots.push({
      zone: zone.zone,
      currentLevel: round(latest, 2),
      threshold: round(p75, 2),
      severity: latest > percentile(series, 90) ? 'High' : 'Moderate',
    });
  }
  return hotspots;
}

export interface AirQualityServiceDeps {
  db: Db;
  weather: WeatherService;
  city: CityData;
  guidance: GuidanceTable;
  rng: Rng;
}

export async function getAirQualityDashboard(deps: AirQualityServiceDeps, stakeholder: StakeholderId): Promise<AirQualityDashboard> {
  const [current, hourly] = await Promise.all([
    deps.weather.getAirQuality(),
    deps.weather.getHourlyAirQuality(24),
  ]);

  return {
    current,
    stations: listStations(deps.db).map(withCategory),
    hourly,
    hotspots: detectPollutionHotspots(deps.city.air.pollutionZones, deps.rng, deps.city.air.hotspotDays),
    guidance: getStakeholderGuidance(deps.guidance, 'air', stakeholder),
  };
}
