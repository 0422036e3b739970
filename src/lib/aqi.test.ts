import { describe, expect, it } from 'vitest';
import { calculateAqi, getAqiColor, getAqiStatus, getPm25Level, pm10ToAqi, pm25ToAqi } from './aqi';

describe('pm25ToAqi', () => {
  it('interpolates within a breakpoint band and truncates', () => {
    expect(pm25ToAqi(68)).toBe(157);
    expect(pm25ToAqi(100)).toBe(173);
  });

  it('hits band edges exactly', () => {
    expect(pm25ToAqi(0)).toBe(0);
    expect(pm25ToAqi(12)).toBe(50);
    expect(pm25ToAqi(35.4)).toBe(100);
  });

  it('treats negative readings as zero and caps at 500', () => {
    expect(pm25ToAqi(-5)).toBe(0);
    expect(pm25ToAqi(900)).toBe(500);
  });
});

describe('pm10ToAqi', () => {
  it('uses the PM10 table', () => {
    expect(pm10ToAqi(98)).toBe(72);
    expect(pm10ToAqi(54)).toBe(50);
  });
});

describe('calculateAqi', () => {
  it('reports the higher sub-index as dominant', () => {
    expect(calculateAqi({ pm25: 68, pm10: 98 })).toEqual({ aqi: 157, dominantPollutant: 'pm25' });
    expect(calculateAqi({ pm25: 5, pm10: 98 })).toEqual({ aqi: 72, dominantPollutant: 'pm10' });
  });

  it('prefers PM2.5 on a tie', () => {
    expect(calculateAqi({ pm25: 12, pm10: 54 })).toEqual({ aqi: 50, dominantPollutant: 'pm25' });
  });
});

describe('AQI presentation', () => {
  it('maps values to colour classes', () => {
    expect(getAqiColor(50)).toBe('text-emerald-500');
    expect(getAqiColor(51)).toBe('text-yellow-500');
    expect(getAqiColor(157)).toBe('text-orange-500');
    expect(getAqiColor(250)).toBe('text-red-500');
    expect(getAqiColor(301)).toBe('text-purple-600');
  });

  it('labels each band', () => {
    expect(getAqiStatus(157).label).toBe('Poor');
    expect(getAqiStatus(157)).toEqual({
      label: 'Poor',
      desc: 'Members of sensitive groups may experience health effects.',
      color: 'bg-orange-500',
    });
    expect(getAqiStatus(400).label).toBe('Severe');
  });

  it('grades PM2.5 for the assistant', () => {
    expect(getPm25Level(25)).toBe('Good');
    expect(getPm25Level(50)).toBe('Moderate');
    expect(getPm25Level(68)).toBe('Poor');
  });
});
