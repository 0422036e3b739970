import { validateEnvironmentalData } from '../../lib/metrics';
import type {
  AirQualityReading,
  Alert,
  CityInfo,
  Lake,
  MetricTile,
  OverviewDashboard,
  StakeholderId,
  WeatherReading,
} from '../../types';
import type { CityData, GuidanceTable } from '../data/cityData';
import type { Db } from '../db';
import { getStakeholderGuidance } from './guidance';
import { listLakes } from './water';
import type { WeatherService } from './weather';

const AQI_ALERT_THRESHOLD = 150;
const HEAT_INDEX_ALERT_THRESHOLD = 40;
const LAKE_ALERT_THRESHOLD = 4;

interface AlertRow {
  id: string;
  type: string;
  location: string;
  severity: Alert['severity'];
  created_at: string;
}

export function listSeedAlerts(db: Db): Alert[] {
  return db
    .prepare<[], AlertRow>('SELECT * FROM alerts ORDER BY created_at DESC')
    .all()
    .map((row): Alert => ({
      id: row.id,
      type: row.type,
      location: row.location,
      severity: row.severity,
      createdAt: row.created_at,
      origin: 'seed',
    }));
}

/** Alerts raised by the current readings: high AQI, heat index, and each lake in poor health. */
export function evaluateAlertRules(
  input: { cityName: string; weather: WeatherReading; airQuality: AirQualityReading; lakes: Lake[] },
  now: Date,
): Alert[] {
  const createdAt = now.toISOString();
  const alerts: Alert[] = [];

  if (input.airQuality.aqi > AQI_ALERT_THRESHOLD) {
    alerts.push({ id: 'rule-aqi', type: 'Air Quality', location: input.cityName, severity: 'High', createdAt, origin: 'rule' });
  }
  if (input.weather.heatIndex >= HEAT_INDEX_ALERT_THRESHOLD) {
    alerts.push({ id: 'rule-heat', type: 'Heat Wave', location: input.cityName, severity: 'High', createdAt, origin: 'rule' });
  }
  for (const lake of input.lakes) {
    if (lake.healthScore < LAKE_ALERT_THRESHOLD) {
      alerts.push({ id: `rule-${lake.id}`, type: 'Water Quality', location: lake.name, severity: 'High', createdAt, origin: 'rule' });
    }
  }
  return alerts;
}

const signed = (value: number, unit = '') => `${value > 0 ? '+' : ''}${value.toFixed(1)}${unit}`;

export function buildMetricTiles(
  city: CityData,
  weather: WeatherReading,
  airQuality: AirQualityReading,
  lakes: Lake[],
): MetricTile[] {
  const meanHealth = lakes.length ? lakes.reduce((sum, lake) => sum + lake.healthScore, 0) / lakes.length : 0;
  const belowThreshold = lakes.filter(lake => lake.healthScore < city.water.criticalThreshold).length;
  const { temperatureBaseline, greenCover } = city.overview;

  return [
    {
      label: 'Average Temperature',
      value: `${weather.temperature.toFixed(1)}°C`,
      delta: signed(weather.temperature - temperatureBaseline, '°C'),
    },
    { label: 'Lake Health Index', value: `${meanHealth.toFixed(1)}/10`, delta: `${belowThreshold} below threshold` },
    { label: 'Air Quality Index', value: String(airQuality.aqi), delta: airQuality.category },
    { label: 'Green Cover', value: `${greenCover.value.toFixed(1)}%`, delta: signed(greenCover.delta, '%') },
  ];
}

export interface OverviewServiceDeps {
  db: Db;
  weather: WeatherService;
  city: CityData;
  cityInfo: CityInfo;
  guidance: GuidanceTable;
  now: () => Date;
}

export async function getOverviewDashboard(deps: OverviewServiceDeps, stakeholder: StakeholderId): Promise<OverviewDashboard> {
  const [weather, airQuality] = await Promise.all([deps.weather.getCurrentWeather(), deps.weather.getAirQuality()]);
  const lakes = listLakes(deps.db);
  const now = deps.now();

  return {
    city: deps.cityInfo,
    metrics: buildMetricTiles(deps.city, weather.data, airQuality.data, lakes),
    weather,
    airQuality,
    locations: deps.city.sampleLocations,
    alerts: [
      ...evaluateAlertRules({ cityName: deps.cityInfo.name, weather: weather.data, airQuality: airQuality.data, lakes }, now),
      ...listSeedAlerts(deps.db),
    ],
    validation: validateEnvironmentalData({
      city: deps.cityInfo.name,
      temperature: weather.data.temperature,
      aqi: airQuality.data.aqi,
      lakes: lakes.map(lake => ({ name: lake.name, healthScore: lake.healthScore })),
    }),
    dataSources: deps.city.overview.dataSources,
    lastUpdated: now.toISOString(),
    guidance: getStakeholderGuidance(deps.guidance, 'overview', stakeholder),
  };
}
