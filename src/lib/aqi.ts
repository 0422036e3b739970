import type { AqiCategory } from '../types';

/** [concentration low, concentration high, index low, index high] */
type Breakpoint = readonly [number, number, number, number];

const PM25_BREAKPOINTS: readonly Breakpoint[] = [
  [0, 12.0, 0, 50],
  [12.1, 35.4, 51, 100],
  [35.5, 55.4, 101, 150],
  [55.5, 150.4, 151, 200],
  [150.5, 250.4, 201, 300],
  [250.5, 350.4, 301, 400],
  [350.5, 500.4, 401, 500],
];

const PM10_BREAKPOINTS: readonly Breakpoint[] = [
  [0, 54, 0, 50],
  [55, 154, 51, 100],
  [155, 254, 101, 150],
  [255, 354, 151, 200],
  [355, 424, 201, 300],
  [425, 504, 301, 400],
  [505, 604, 401, 500],
];

const MAX_AQI = 500;

export const linearInterpolation = (x: number, x1: number, x2: number, y1: number, y2: number) =>
  ((y2 - y1) / (x2 - x1)) * (x - x1) + y1;

function toIndex(concentration: number, table: readonly Breakpoint[]): number {
  const c = Math.max(0, concentration);
  for (const [cLow, cHigh, iLow, iHigh] of table) {
    if (c <= cHigh) return Math.trunc(linearInterpolation(c, cLow, cHigh, iLow, iHigh));
  }
  return MAX_AQI;
}

export const pm25ToAqi = (concentration: number) => toIndex(concentration, PM25_BREAKPOINTS);
export const pm10ToAqi = (concentration: number) => toIndex(concentration, PM10_BREAKPOINTS);

/** Overall AQI is the highest sub-index; PM2.5 wins ties. */
export function calculateAqi(reading: { pm25: number; pm10: number }): { aqi: number; dominantPollutant: 'pm25' | 'pm10' } {
  const fromPm25 = pm25ToAqi(reading.pm25);
  const fromPm10 = pm10ToAqi(reading.pm10);
  return fromPm10 > fromPm25
    ? { aqi: fromPm10, dominantPollutant: 'pm10' }
    : { aqi: fromPm25, dominantPollutant: 'pm25' };
}

/** Map an AQI value to its Tailwind text-colour class (green → purple). */
export const getAqiColor = (aqi: number) => {
  if (aqi <= 50) return 'text-emerald-500';   // Good
  if (aqi <= 100) return 'text-yellow-500';   // Moderate
  if (aqi <= 200) return 'text-orange-500';   // Poor
  if (aqi <= 300) return 'text-red-500';      // Very Poor
  return 'text-purple-600';                   // Severe
};

/** Map an AQI value to a label, health description, and Tailwind background class. */
export const getAqiStatus = (aqi: number): { label: AqiCategory; desc: string; color: string } => {
  if (aqi <= 50) return { label: 'Good', desc: 'Air quality is satisfactory, and air pollution poses little or no risk.', color: 'bg-emerald-500' };
  if (aqi <= 100) return { label: 'Moderate', desc: 'Air quality is acceptable. However, there may be a risk for some people.', color: 'bg-yellow-500' };
  if (aqi <= 200) return { label: 'Poor', desc: 'Members of sensitive groups may experience health effects.', color: 'bg-orange-500' };
  if (aqi <= 300) return { label: 'Very Poor', desc: 'Health alert: The risk of health effects is increased for everyone.', color: 'bg-red-500' };
  return { label: 'Severe', desc: 'Health warning of emergency conditions: everyone is more likely to be affected.', color: 'bg-purple-600' };
};

export const getPm25Level = (pm25: number): 'Good' | 'Moderate' | 'Poor' => {
  if (pm25 <= 25) return 'Good';
  if (pm25 <= 50) return 'Moderate';
  return 'Poor';
};
