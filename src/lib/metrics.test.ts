import { describe, expect, it } from 'vitest';
import {
  assessAlgalBloomRisk,
  calculateHeatIndex,
  calculateWaterQualityIndex,
  classifyTrend,
  getGrowthStatus,
  getLakeHealthStatus,
  getUvRiskLevel,
  getVulnerabilityPriority,
  linearTrend,
  minMaxNormalize,
  percentile,
  validateEnvironmentalData,
} from './metrics';

describe('calculateHeatIndex', () => {
  it('returns the air temperature below 27 °C', () => {
    expect(calculateHeatIndex(26.9, 90)).toBe(26.9);
  });

  it('applies the regression at and above 27 °C', () => {
    expect(calculateHeatIndex(30, 70)).toBe(35);
    expect(calculateHeatIndex(35, 50)).toBe(40.7);
  });
});

describe('classifiers', () => {
  it('grades UV exposure', () => {
    expect(getUvRiskLevel(2)).toBe('Low');
    expect(getUvRiskLevel(5)).toBe('Moderate');
    expect(getUvRiskLevel(7)).toBe('High');
    expect(getUvRiskLevel(8)).toBe('Very High');
    expect(getUvRiskLevel(11)).toBe('Extreme');
  });

  it('grades lake health', () => {
    expect(getLakeHealthStatus(7)).toEqual({ status: 'Good', color: 'green' });
    expect(getLakeHealthStatus(4.1)).toEqual({ status: 'Moderate', color: 'yellow' });
    expect(getLakeHealthStatus(3.2)).toEqual({ status: 'Poor', color: 'red' });
  });

  it('derives water quality from the number of pollution sources', () => {
    expect(calculateWaterQualityIndex(0)).toBe(70);
    expect(calculateWaterQualityIndex(3)).toBe(40);
    expect(calculateWaterQualityIndex(9)).toBe(0);
  });

  it('rates algal bloom risk by lake area', () => {
    expect(assessAlgalBloomRisk(361)).toBe('High');
    expect(assessAlgalBloomRisk(200)).toBe('Medium');
    expect(assessAlgalBloomRisk(50)).toBe('Low');
  });

  it('grades growth and sizes the marker', () => {
    expect(getGrowthStatus(4)).toEqual({ status: 'Stable', color: 'green', radius: 10 });
    expect(getGrowthStatus(5)).toEqual({ status: 'Moderate Growth', color: 'yellow', radius: 10.5 });
    expect(getGrowthStatus(12)).toEqual({ status: 'High Growth', color: 'orange', radius: 14 });
    expect(getGrowthStatus(18)).toEqual({ status: 'Rapid Growth', color: 'red', radius: 17 });
  });

  it('buckets vulnerability', () => {
    expect(getVulnerabilityPriority(0.75)).toBe('Critical');
    expect(getVulnerabilityPriority(0.5)).toBe('High');
    expect(getVulnerabilityPriority(0.25)).toBe('Medium');
    expect(getVulnerabilityPriority(0.24)).toBe('Low');
  });
});

describe('series statistics', () => {
  it('fits a least-squares slope', () => {
    expect(linearTrend([1, 2, 3, 4])).toBe(1);
    expect(linearTrend([5])).toBe(0);
    expect(linearTrend([4, 4, 4])).toBe(0);
  });

  it('labels the slope', () => {
    expect(classifyTrend(0.2)).toBe('Improving');
    expect(classifyTrend(-0.2)).toBe('Deteriorating');
    expect(classifyTrend(0.1)).toBe('Stable');
  });

  it('interpolates percentiles', () => {
    expect(percentile([4, 1, 3, 2], 50)).toBe(2.5);
    expect(percentile([1, 2, 3, 4, 5], 75)).toBe(4);
    expect(() => percentile([], 50)).toThrow('percentile of an empty series');
  });

  it('normalizes to [0, 1]', () => {
    expect(minMaxNormalize([2, 4, 6])).toEqual([0, 0.5, 1]);
    expect(minMaxNormalize([3, 3])).toEqual([0, 0]);
  });
});

describe('validateEnvironmentalData', () => {
  it('accepts typical values', () => {
    expect(validateEnvironmentalData({ city: 'Bengaluru', temperature: 28, aqi: 120, lakes: [{ name: 'Ulsoor Lake', healthScore: 6.8 }] }))
      .toEqual({ valid: true, warnings: [], errors: [] });
  });

  it('warns on unusual temperatures without failing', () => {
    const result = validateEnvironmentalData({ city: 'Bengaluru', temperature: 52 });
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(['Temperature 52°C is outside typical range for Bengaluru']);
  });

  it('rejects out-of-range AQI and lake scores', () => {
    const result = validateEnvironmentalData({ city: 'Bengaluru', aqi: 600, lakes: [{ name: 'Test Lake', healthScore: 11 }] });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'AQI value 600 is outside valid range (0-500)',
      'Lake health score 11 for Test Lake is outside valid range (0-10)',
    ]);
  });
});
