import { z } from 'zod';
import { calculateAqi, getAqiStatus } from '../../lib/aqi';
import { calculateHeatIndex, getUvRiskLevel } from '../../lib/metrics';
import { applyVariation, round, uniform, type Rng } from '../../lib/random';
import type {
  AirQualityReading,
  DailyForecast,
  HourlyAirQuality,
  Sourced,
  UvReading,
  WeatherReading,
} from '../../types';
import type { AppConfig } from '../config';
import type { CityData } from '../data/cityData';
import type { Db } from '../db';
import { buildUrl, fetchJson, type FetchFn, type SleepFn } from '../http';

export type SnapshotKind = 'weather' | 'air_quality' | 'forecast' | 'air_quality_hourly' | 'uv';

const FALLBACK_UV_INDEX = 8;
const ONE_HOUR_MS = 60 * 60 * 1000;
const ONE_DAY_MS = 24 * ONE_HOUR_MS;

const nullableNumber = z.number().nullable().optional();
const numberSeries = z.array(z.number().nullable());

// ---- Open-Meteo payloads ---------------------------------------------------

const CurrentWeatherSchema = z.object({
  current: z.object({
    time: z.string(),
    temperature_2m: z.number(),
    relative_humidity_2m: z.number(),
    apparent_temperature: nullableNumber,
    weather_code: nullableNumber,
    wind_speed_10m: nullableNumber,
    wind_direction_10m: nullableNumber,
  }),
});

const CurrentAirQualitySchema = z.object({
  current: z.object({
    time: z.string(),
    pm2_5: z.number(),
    pm10: z.number(),
    carbon_monoxide: nullableNumber,
    nitrogen_dioxide: nullableNumber,
    sulphur_dioxide: nullableNumber,
    ozone: nullableNumber,
  }),
});

const DailyForecastSchema = z.object({
  daily: z.object({
    time: z.array(z.string()),
    temperature_2m_max: numberSeries,
    temperature_2m_min: numberSeries,
    precipitation_sum: numberSeries.optional(),
    wind_speed_10m_max: numberSeries.optional(),
    weather_code: numberSeries.optional(),
  }),
});

const HourlyAirQualitySchema = z.object({
  hourly: z.object({
    time: z.array(z.string()),
    pm2_5: numberSeries,
    pm10: numberSeries,
  }),
});

const DailyUvSchema = z.object({
  daily: z.object({
    time: z.array(z.string()),
    uv_index_max: numberSeries,
  }),
});

interface Source<Raw, T> {
  kind: SnapshotKind;
  /** Length of the requested series; snapshots of other lengths are not reused. */
  span?: number;
  url: string;
  schema: z.ZodType<Raw, z.ZodTypeDef, unknown>;
  transform: (raw: Raw) => T;
  fallback: () => T;
}

const snapshotKey = (source: { kind: SnapshotKind; span?: number }) =>
  source.span === undefined ? source.kind : `${source.kind}:${source.span}`;

export interface WeatherServiceOptions {
  db: Db;
  config: AppConfig;
  city: CityData;
  fetchFn?: FetchFn;
  sleepFn?: SleepFn;
  rng?: Rng;
  now?: () => Date;
}

/**
 * Live weather and air quality for the configured city.
 *
 * Every read goes live first. A successful payload is stored as the snapshot
 * for its kind; when the live call fails the latest snapshot younger than
 * `snapshotMaxAgeMinutes` is used (`cached`), and failing that a built-in
 * value (`fallback`). Both downgrades are marked `stale`.
 */
export class WeatherService {
  private readonly db: Db;
  private readonly config: AppConfig;
  private readonly city: CityData;
  private readonly fetchFn?: FetchFn;
  private readonly sleepFn?: SleepFn;
  private readonly rng: Rng;
  private readonly now: () => Date;

  constructor(options: WeatherServiceOptions) {
    this.db = options.db;
    this.config = options.config;
    this.city = options.city;
    this.fetchFn = options.fetchFn;
    this.sleepFn = options.sleepFn;
    this.rng = options.rng ?? Math.random;
    this.now = options.now ?? (() => new Date());
  }

  private get location() {
    const { latitude, longitude, timezone } = this.config.city;
    return { latitude, longitude, timezone };
  }

  getCurrentWeather(): Promise<Sourced<WeatherReading>> {
    return this.load({
      kind: 'weather',
      url: buildUrl(this.config.openMeteo.forecastUrl, 'forecast', {
        ...this.location,
        current: [
          'temperature_2m',
          'relative_humidity_2m',
          'apparent_temperature',
          'weather_code',
          'wind_speed_10m',
          'wind_direction_10m',
        ],
      }),
      schema: CurrentWeatherSchema,
      transform: ({ current }) => ({
        temperature: current.temperature_2m,
        humidity: current.relative_humidity_2m,
        apparentTemperature: current.apparent_temperature ?? null,
        weatherCode: current.weather_code ?? null,
        windSpeed: current.wind_speed_10m ?? null,
        windDirection: current.wind_direction_10m ?? null,
        heatIndex: calculateHeatIndex(current.temperature_2m, current.relative_humidity_2m),
        observedAt: current.time,
      }),
      fallback: () => {
        const { fallbackTemperature, fallbackHumidity } = this.city.overview;
        return {
          temperature: fallbackTemperature,
          humidity: fallbackHumidity,
          apparentTemperature: null,
          weatherCode: null,
          windSpeed: null,
          windDirection: null,
          heatIndex: calculateHeatIndex(fallbackTemperature, fallbackHumidity),
          observedAt: this.now().toISOString(),
        };
      },
    });
  }

  getAirQuality(): Promise<Sourced<AirQualityReading>> {
    const simulated = this.city.air.fallback;
    return this.load({
      kind: 'air_quality',
      url: buildUrl(this.config.openMeteo.airQualityUrl, 'air-quality', {
        ...this.location,
        current: ['pm10', 'pm2_5', 'carbon_monoxide', 'nitrogen_dioxide', 'sulphur_dioxide', 'ozone'],
      }),
      schema: CurrentAirQualitySchema,
      transform: ({ current }) =>
        this.toAirQualityReading({
          pm25: current.pm2_5,
          pm10: current.pm10,
          no2: current.nitrogen_dioxide ?? this.jitter(simulated.no2),
          so2: current.sulphur_dioxide ?? this.jitter(simulated.so2),
          o3: current.ozone ?? this.jitter(simulated.o3),
          // µg/m³ upstream, mg/m³ on the dashboard
          co: current.carbon_monoxide != null ? round(current.carbon_monoxide / 1000, 2) : this.jitter(simulated.co, 2),
          observedAt: current.time,
        }),
      fallback: () =>
        this.toAirQualityReading({
          pm25: this.jitter(simulated.pm25),
          pm10: this.jitter(simulated.pm10),
          no2: this.jitter(simulated.no2),
          so2: this.jitter(simulated.so2),
          o3: this.jitter(simulated.o3),
          co: this.jitter(simulated.co, 2),
          observedAt: this.now().toISOString(),
        }),
    });
  }

  getForecast(days = 7): Promise<Sourced<DailyForecast[]>> {
    return this.load({
      kind: 'forecast',
      span: days,
      url: buildUrl(this.config.openMeteo.forecastUrl, 'forecast', {
        ...this.location,
        daily: ['temperature_2m_max', 'temperature_2m_min', 'precipitation_sum', 'wind_speed_10m_max', 'weather_code'],
        forecast_days: days,
      }),
      schema: DailyForecastSchema,
      transform: ({ daily }) => {
        const forecast: DailyForecast[] = [];
        daily.time.slice(0, days).forEach((date, i) => {
          const max = daily.temperature_2m_max[i];
          const min = daily.temperature_2m_min[i];
          if (max == null || min == null) return;
          forecast.push({
            date,
            temperatureMax: max,
            temperatureMin: min,
            precipitationSum: daily.precipitation_sum?.[i] ?? 0,
            windSpeedMax: daily.wind_speed_10m_max?.[i] ?? 0,
            weatherCode: daily.weather_code?.[i] ?? null,
          });
        });
        if (!forecast.length) throw new Error('Forecast contained no complete days');
        return forecast;
      },
      fallback: () => {
        const { max, min } = this.city.heat.weeklyBaseline;
        const start = this.now().getTime();
        return Array.from({ length: days }, (_, i) => ({
          date: new Date(start + i * ONE_DAY_MS).toISOString().slice(0, 10),
          temperatureMax: applyVariation(max, i, 1.5),
          temperatureMin: applyVariation(min, i, 1),
          precipitationSum: Math.max(0, applyVariation(2, i, 2)),
          windSpeedMax: applyVariation(12, i, 3),
          weatherCode: null,
        }));
      },
    });
  }

  getHourlyAirQuality(hours = 24): Promise<Sourced<HourlyAirQuality[]>> {
    return this.load({
      kind: 'air_quality_hourly',
      span: hours,
      url: buildUrl(this.config.openMeteo.airQualityUrl, 'air-quality', {
        ...this.location,
        hourly: ['pm2_5', 'pm10'],
        forecast_hours: hours,
      }),
      schema: HourlyAirQualitySchema,
      transform: ({ hourly }) => {
        const series: HourlyAirQuality[] = [];
        hourly.time.slice(0, hours).forEach((time, i) => {
          const pm25 = hourly.pm2_5[i];
          const pm10 = hourly.pm10[i];
          if (pm25 == null || pm10 == null) return;
          series.push({ time, pm25, pm10, aqi: calculateAqi({ pm25, pm10 }).aqi });
        });
        if (!series.length) throw new Error('Hourly air quality contained no readings');
        return series;
      },
      fallback: () => {
        const { pm25: basePm25, pm10: basePm10 } = this.city.air.fallback;
        const start = Math.floor(this.now().getTime() / ONE_HOUR_MS) * ONE_HOUR_MS;
        return Array.from({ length: hours }, (_, i) => {
          const pm25 = Math.max(0, applyVariation(basePm25, i, 12));
          const pm10 = Math.max(0, applyVariation(basePm10, i, 15));
          return {
            time: new Date(start + i * ONE_HOUR_MS).toISOString(),
            pm25,
            pm10,
            aqi: calculateAqi({ pm25, pm10 }).aqi,
          };
        });
      },
    });
  }

  getUvIndex(): Promise<Sourced<UvReading>> {
    return this.load({
      kind: 'uv',
      url: buildUrl(this.config.openMeteo.forecastUrl, 'forecast', {
        ...this.location,
        daily: ['uv_index_max'],
        forecast_days: 1,
      }),
      schema: DailyUvSchema,
      transform: ({ daily }) => {
        const uvIndex = daily.uv_index_max[0];
        if (uvIndex == null) throw new Error('UV index missing from forecast');
        return { uvIndex, riskLevel: getUvRiskLevel(uvIndex) };
      },
      fallback: () => ({ uvIndex: FALLBACK_UV_INDEX, riskLevel: getUvRiskLevel(FALLBACK_UV_INDEX) }),
    });
  }

  // ---- Internals -----------------------------------------------------------

  private jitter(value: number, digits = 1) {
    return round(value * uniform(this.rng, 0.9, 1.1), digits);
  }

  private toAirQualityReading(values: Omit<AirQualityReading, 'aqi' | 'dominantPollutant' | 'category'>): AirQualityReading {
    const { aqi, dominantPollutant } = calculateAqi(values);
    return { ...values, aqi, dominantPollutant, category: getAqiStatus(aqi).label };
  }

  private async load<Raw, T>(source: Source<Raw, T>): Promise<Sourced<T>> {
    const now = this.now();
    try {
      const raw = await fetchJson(source.url, source.schema, {
        settings: this.config.http,
        fetchFn: this.fetchFn,
        sleepFn: this.sleepFn,
      });
      const data = source.transform(raw);
      this.saveSnapshot(snapshotKey(source), raw, now);
      return { data, source: 'live', stale: false, fetchedAt: now.toISOString() };
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      const cached = this.readSnapshot(source, now);
      if (cached) {
        console.warn(`Live ${source.kind} fetch failed, using cached snapshot:`, error);
        return { data: cached.data, source: 'cached', stale: true, fetchedAt: cached.fetchedAt, error };
      }
      console.warn(`Live ${source.kind} fetch failed, using fallback values:`, error);
      return { data: source.fallback(), source: 'fallback', stale: true, fetchedAt: now.toISOString(), error };
    }
  }

  private saveSnapshot(key: string, payload: unknown, fetchedAt: Date) {
    this.db
      .prepare(
        `INSERT INTO api_snapshots (snapshot_key, payload, fetched_at) VALUES (?, ?, ?)
         ON CONFLICT(snapshot_key) DO UPDATE SET payload = excluded.payload, fetched_at = excluded.fetched_at`,
      )
      .run(key, JSON.stringify(payload), fetchedAt.toISOString());
  }

  private readSnapshot<Raw, T>(source: Source<Raw, T>, now: Date): { data: T; fetchedAt: string } | null {
    const row = this.db
      .prepare<[string], { payload: string; fetched_at: string }>('SELECT payload, fetched_at FROM api_snapshots WHERE snapshot_key = ?')
      .get(snapshotKey(source));
    if (!row) return null;

    const ageMinutes = (now.getTime() - new Date(row.fetched_at).getTime()) / 60000;
    if (ageMinutes > this.config.snapshotMaxAgeMinutes) return null;

    try {
      const parsed = source.schema.safeParse(JSON.parse(row.payload));
      if (!parsed.success) return null;
      return { data: source.transform(parsed.data), fetchedAt: row.fetched_at };
    } catch (err) {
      console.warn(`Discarding unreadable ${source.kind} snapshot:`, err);
      return null;
    }
  }
}
