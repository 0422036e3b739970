import { readFileSync } from 'fs';
import { z } from 'zod';
import { MODULE_IDS, REPORT_SEVERITIES, REPORT_STATUSES, REPORT_TYPES, STAKEHOLDER_IDS } from '../../lib/catalog';

// ---------------------------------------------------------------------------
// Static datasets for the monitored city, validated on load so a malformed
// edit fails at start-up rather than on a page view.
// ---------------------------------------------------------------------------

const coordinates = { latitude: z.number().min(-90).max(90), longitude: z.number().min(-180).max(180) };
const range = z.tuple([z.number(), z.number()]);
const tile = z.object({ label: z.string(), value: z.string(), delta: z.string() });

const LakeSchema = z.object({
  id: z.string(),
  name: z.string(),
  ...coordinates,
  areaHectares: z.number().nonnegative(),
  // Not range-checked here; the validator reports out-of-range scores instead.
  healthScore: z.number(),
  pollutionLevel: z.enum(['Low', 'Moderate', 'High']),
  pollutionSources: z.array(z.string()),
});

const CitySchema = z.object({
  lakes: z.array(LakeSchema),
  stations: z.array(z.object({
    id: z.string(),
    name: z.string(),
    ...coordinates,
    aqi: z.number().int(),
    pm25: z.number(),
    pm10: z.number(),
    no2: z.number(),
    stationType: z.string(),
  })),
  sampleLocations: z.array(z.object({ name: z.string(), ...coordinates, type: z.string(), color: z.string() })),
  alerts: z.array(z.object({
    id: z.string(),
    type: z.string(),
    location: z.string(),
    severity: z.enum(['High', 'Moderate', 'Low']),
    hoursAgo: z.number().nonnegative(),
  })),
  reports: z.array(z.object({
    type: z.enum(REPORT_TYPES),
    severity: z.enum(REPORT_SEVERITIES),
    status: z.enum(REPORT_STATUSES),
    description: z.string(),
    ...coordinates,
    hoursAgo: z.number().nonnegative(),
  })),
  heat: z.object({
    baseTemperature: z.number(),
    areas: z.array(z.object({
      areaType: z.enum(['urban_core', 'residential', 'industrial', 'green', 'suburban']),
      latRange: range,
      lonRange: range,
      offset: z.number(),
      sd: z.number().nonnegative(),
    })),
    zones: z.array(z.object({ zone: z.string(), current: z.number(), dailyMax: z.number(), heatIndexLabel: z.string() })),
    wards: z.array(z.object({ ward: z.string(), averageTemperature: z.number(), population: z.number(), greenCover: z.number() })),
    weeklyBaseline: z.object({ max: z.number(), min: z.number() }),
    islands: z.object({
      intensity: z.number(),
      surfaceIntensity: z.number(),
      canopyIntensity: z.number(),
      hotspots: z.array(z.object({ name: z.string(), intensity: z.number(), ...coordinates })),
      coolingZones: z.array(z.object({ name: z.string(), cooling: z.number(), ...coordinates })),
    }),
  }),
  water: z.object({
    floodZones: z.array(z.object({ area: z.string(), ...coordinates, risk: z.enum(['High', 'Medium']) })),
    floodRisk: z.array(z.object({
      area: z.string(),
      riskLevel: z.string(),
      historicalFloods: z.number().int(),
      drainageCapacity: z.string(),
      populationAtRisk: z.number().int(),
    })),
    supply: z.array(tile),
    trendDays: z.number().int().positive(),
    trendSd: z.number().nonnegative(),
    criticalThreshold: z.number(),
  }),
  air: z.object({
    fallback: z.object({ pm25: z.number(), pm10: z.number(), no2: z.number(), so2: z.number(), o3: z.number(), co: z.number() }),
    pollutionZones: z.array(z.object({ zone: z.string(), mean: z.number(), sd: z.number() })),
    hotspotDays: z.number().int().positive(),
  }),
  growth: z.object({
    zones: z.array(z.object({ zone: z.string(), ...coordinates, growthRate: z.number(), type: z.string() })),
    metroLines: z.array(z.object({ name: z.string(), color: z.string(), path: z.array(z.tuple([z.number(), z.number()])) })),
    growthStats: z.array(z.object({
      zone: z.string(),
      growthRate: z.number(),
      newBuildings: z.number().int(),
      populationChange: z.number().int(),
      developmentType: z.string(),
    })),
    development: z.array(z.object({ year: z.string(), builtUpArea: z.number(), greenCover: z.number(), population: z.number() })),
    landUse: z.array(z.object({ originalUse: z.string(), currentUse: z.string(), areaLost: z.number(), impactLevel: z.string() })),
    infrastructure: z.array(tile),
    hotspots: z.array(z.object({
      area: z.string(),
      intensity: z.string(),
      driver: z.string(),
      infrastructureReadiness: z.string(),
      environmentalImpact: z.string(),
    })),
    landCover: z.object({
      urbanGrowthRate: z.number(),
      forestLossRate: z.number(),
      agriculturalChange: z.number(),
      waterBodyChange: z.number(),
      totalAreaKm2: z.number(),
      dominantChange: z.string(),
    }),
  }),
  overview: z.object({
    fallbackTemperature: z.number(),
    fallbackHumidity: z.number(),
    temperatureBaseline: z.number(),
    greenCover: z.object({ value: z.number(), delta: z.number() }),
    dataSources: z.array(z.string()),
  }),
});

const GuidanceEntrySchema = z.object({ focus: z.string(), actions: z.array(z.string()) });

const GuidanceSchema = z.record(
  z.enum(MODULE_IDS),
  z.record(z.enum(STAKEHOLDER_IDS), GuidanceEntrySchema),
);

export type CityData = z.infer<typeof CitySchema>;
export type GuidanceTable = z.infer<typeof GuidanceSchema>;

function readJson<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const raw: unknown = JSON.parse(readFileSync(new URL(file, import.meta.url), 'utf8'));
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.slice(0, 5).map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid dataset ${file}: ${details}`);
  }
  return parsed.data;
}

export const loadCityData = () => readJson('./city.json', CitySchema);
export const loadGuidance = () => readJson('./guidance.json', GuidanceSchema);
