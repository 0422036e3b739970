import type { GrowthStatus, HealthStatus, PriorityLevel, TrendLabel, UvRiskLevel, ValidationResult } from '../types';
import { clamp, round } from './random';

/** Heat index in °C. Not meaningful below 27 °C, where the air temperature is returned unchanged. */
export function calculateHeatIndex(temperature: number, humidity: number): number {
  if (temperature < 27) return temperature;
  const t = temperature;
  const rh = humidity;
  const hi =
    -8.784695 +
    1.61139411 * t +
    2.338549 * rh -
    0.14611605 * t * rh -
    0.012308094 * t ** 2 -
    0.016424828 * rh ** 2 +
    0.002211732 * t ** 2 * rh +
    0.00072546 * t * rh ** 2 -
    0.000003582 * t ** 2 * rh ** 2;
  return round(hi, 1);
}

export const getUvRiskLevel = (uvIndex: number): UvRiskLevel => {
  if (uvIndex <= 2) return 'Low';
  if (uvIndex <= 5) return 'Moderate';
  if (uvIndex <= 7) return 'High';
  if (uvIndex <= 10) return 'Very High';
  return 'Extreme';
};

export const getLakeHealthStatus = (healthScore: number): { status: HealthStatus; color: string } => {
  if (healthScore >= 7) return { status: 'Good', color: 'green' };
  if (healthScore >= 4) return { status: 'Moderate', color: 'yellow' };
  return { status: 'Poor', color: 'red' };
};

/** 0–100 index; each known pollution source costs ten points off a base of 70. */
export const calculateWaterQualityIndex = (pollutionSourceCount: number) => clamp(70 - pollutionSourceCount * 10, 0, 100);

/** Larger lakes are more prone to blooms. */
export const assessAlgalBloomRisk = (areaHectares: number): 'High' | 'Medium' | 'Low' => {
  if (areaHectares > 200) return 'High';
  if (areaHectares > 50) return 'Medium';
  return 'Low';
};

export const getGrowthStatus = (growthRate: number): { status: GrowthStatus; color: string; radius: number } => {
  const radius = 8 + growthRate / 2;
  if (growthRate < 5) return { status: 'Stable', color: 'green', radius };
  if (growthRate < 10) return { status: 'Moderate Growth', color: 'yellow', radius };
  if (growthRate < 15) return { status: 'High Growth', color: 'orange', radius };
  return { status: 'Rapid Growth', color: 'red', radius };
};

export const getVulnerabilityPriority = (index: number): PriorityLevel => {
  if (index >= 0.75) return 'Critical';
  if (index >= 0.5) return 'High';
  if (index >= 0.25) return 'Medium';
  return 'Low';
};

/** Least-squares slope of the values against their index. */
export function linearTrend(values: readonly number[]): number {
  const n = values.length;
  if (n < 2) return 0;
  const meanX = (n - 1) / 2;
  const meanY = values.reduce((sum, v) => sum + v, 0) / n;
  let numerator = 0;
  let denominator = 0;
  values.forEach((y, x) => {
    numerator += (x - meanX) * (y - meanY);
    denominator += (x - meanX) ** 2;
  });
  return numerator / denominator;
}

export const classifyTrend = (slope: number): TrendLabel => {
  if (slope > 0.1) return 'Improving';
  if (slope < -0.1) return 'Deteriorating';
  return 'Stable';
};

/** Percentile with linear interpolation between the closest ranks. */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) throw new Error('percentile of an empty series');
  const sorted = [...values].sort((a, b) => a - b);
  const rank = (clamp(p, 0, 100) / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (rank - lower);
}

/** Scale to [0, 1]; a constant series maps to zeros. */
export function minMaxNormalize(values: readonly number[]): number[] {
  const min = Math.min(...values);
  const max = Math.max(...values);
  if (max === min) return values.map(() => 0);
  return values.map(v => (v - min) / (max - min));
}

export interface EnvironmentalSummary {
  city: string;
  temperature?: number;
  aqi?: number;
  lakes?: { name: string; healthScore: number }[];
}

/** Range checks for the values shown on the dashboard. */
export function validateEnvironmentalData(data: EnvironmentalSummary): ValidationResult {
  const result: ValidationResult = { valid: true, warnings: [], errors: [] };

  if (data.temperature !== undefined && (data.temperature < 15 || data.temperature > 50)) {
    result.warnings.push(`Temperature ${data.temperature}°C is outside typical range for ${data.city}`);
  }

  if (data.aqi !== undefined && (data.aqi < 0 || data.aqi > 500)) {
    result.errors.push(`AQI value ${data.aqi} is outside valid range (0-500)`);
  }

  for (const lake of data.lakes ?? []) {
    if (lake.healthScore < 0 || lake.healthScore > 10) {
      result.errors.push(`Lake health score ${lake.healthScore} for ${lake.name} is outside valid range (0-10)`);
    }
  }

  result.valid = result.errors.length === 0;
  return result;
}
