/** The audience a view is tailored to. */
export type StakeholderId = 'citizens' | 'city-planning' | 'water-board' | 'electricity' | 'parks' | 'researchers';

/** A page of the dashboard. */
export type ModuleId = 'overview' | 'heat' | 'water' | 'air' | 'growth' | 'reports' | 'assistant';

/** Where a value came from: a fresh upstream call, the last stored upstream payload, or a built-in default. */
export type DataSource = 'live' | 'cached' | 'fallback';

/** A value tagged with its provenance so callers can tell fresh data from stale. */
export interface Sourced<T> {
  data: T;
  source: DataSource;
  stale: boolean;
  fetchedAt: string;
  error?: string;
}

/** The monitored city. */
export interface CityInfo {
  name: string;
  latitude: number;
  longitude: number;
  timezone: string;
}

export interface MetricTile {
  label: string;
  value: string;
  delta: string;
}

export interface Guidance {
  focus: string;
  actions: string[];
}

export interface ValidationResult {
  valid: boolean;
  warnings: string[];
  errors: string[];
}

// ---- Weather & air ---------------------------------------------------------

export interface WeatherReading {
  temperature: number;
  humidity: number;
  apparentTemperature: number | null;
  weatherCode: number | null;
  windSpeed: number | null;
  windDirection: number | null;
  heatIndex: number;
  observedAt: string;
}

export type AqiCategory = 'Good' | 'Moderate' | 'Poor' | 'Very Poor' | 'Severe';

export interface AirQualityReading {
  aqi: number;
  pm25: number;
  pm10: number;
  no2: number;
  so2: number;
  o3: number;
  co: number;
  dominantPollutant: 'pm25' | 'pm10';
  category: AqiCategory;
  observedAt: string;
}

export interface DailyForecast {
  date: string;
  temperatureMax: number;
  temperatureMin: number;
  precipitationSum: number;
  windSpeedMax: number;
  weatherCode: number | null;
}

export interface HourlyAirQuality {
  time: string;
  pm25: number;
  pm10: number;
  aqi: number;
}

export type UvRiskLevel = 'Low' | 'Moderate' | 'High' | 'Very High' | 'Extreme';

export interface UvReading {
  uvIndex: number;
  riskLevel: UvRiskLevel;
}

// ---- Heat islands ----------------------------------------------------------

export type AreaType = 'urban_core' | 'residential' | 'industrial' | 'green' | 'suburban';

export interface HeatPoint {
  latitude: number;
  longitude: number;
  areaType: AreaType;
  temperature: number;
}

export interface ZoneTemperature {
  zone: string;
  current: number;
  dailyMax: number;
  heatIndexLabel: string;
}

export interface TemperatureTrendPoint {
  date: string;
  max: number;
  min: number;
  average: number;
}

export type PriorityLevel = 'Critical' | 'High' | 'Medium' | 'Low';

export interface WardVulnerability {
  ward: string;
  averageTemperature: number;
  population: number;
  greenCover: number;
  index: number;
  priority: PriorityLevel;
}

export interface HeatIslandSummary {
  intensity: number;
  surfaceIntensity: number;
  canopyIntensity: number;
  hotspots: { name: string; intensity: number; latitude: number; longitude: number }[];
  coolingZones: { name: string; cooling: number; latitude: number; longitude: number }[];
}

export interface HeatDashboard {
  current: Sourced<WeatherReading>;
  uv: Sourced<UvReading>;
  grid: HeatPoint[];
  zones: ZoneTemperature[];
  trend: Sourced<TemperatureTrendPoint[]>;
  vulnerability: WardVulnerability[];
  islands: HeatIslandSummary;
  guidance: Guidance;
}

// ---- Water -----------------------------------------------------------------

export type PollutionLevel = 'Low' | 'Moderate' | 'High';
export type HealthStatus = 'Good' | 'Moderate' | 'Poor';

/** A monitored lake with its 0–10 health score. */
export interface Lake {
  id: string;
  name: string;
  latitude: number;
  longitude: number;
  areaHectares: number;
  healthScore: number;
  pollutionLevel: PollutionLevel;
  pollutionSources: string[];
}

export interface LakeAssessment extends Lake {
  status: HealthStatus;
  color: string;
  waterQualityIndex: number;
  algalBloomRisk: 'High' | 'Medium' | 'Low';
}

export interface FloodZone {
  area: string;
  latitude: number;
  longitude: number;
  risk: 'High' | 'Medium';
  color: string;
}

export interface FloodRiskRow {
  area: string;
  riskLevel: string;
  historicalFloods: number;
  drainageCapacity: string;
  populationAtRisk: number;
}

export type TrendLabel = 'Improving' | 'Deteriorating' | 'Stable';

export interface LakeTrend {
  lake: string;
  series: { date: string; score: number }[];
  trend: TrendLabel;
  slope: number;
  current: number;
  changeRate: number;
}

export interface WaterDashboard {
  lakes: LakeAssessment[];
  floodZones: FloodZone[];
  floodRisk: FloodRiskRow[];
  qualityTrend: LakeTrend[];
  criticalThreshold: number;
  supply: MetricTile[] | null;
  validation: ValidationResult;
  guidance: Guidance;
}

// ---- Air quality -----------------------------------------------------------

export interface AirStation {
  id: string;
  name: string;
  latitude: number;
  longitude: number;
  aqi: number;
  pm25: number;
  pm10: number;
  no2: number;
  stationType: string;
}

export interface StationStatus extends AirStation {
  category: AqiCategory;
}

export interface PollutionHotspot {
  zone: string;
  currentLevel: number;
  threshold: number;
  severity: 'High' | 'Moderate';
}

export interface AirQualityDashboard {
  current: Sourced<AirQualityReading>;
  stations: StationStatus[];
  hourly: Sourced<HourlyAirQuality[]>;
  hotspots: PollutionHotspot[];
  guidance: Guidance;
}

// ---- Urban growth ----------------------------------------------------------

export type GrowthStatus = 'Stable' | 'Moderate Growth' | 'High Growth' | 'Rapid Growth';

export interface DevelopmentZone {
  zone: string;
  latitude: number;
  longitude: number;
  growthRate: number;
  type: string;
}

export interface ZoneGrowth extends DevelopmentZone {
  status: GrowthStatus;
  color: string;
  radius: number;
}

export interface MetroLine {
  name: string;
  color: string;
  path: [number, number][];
}

export interface GrowthStat {
  zone: string;
  growthRate: number;
  newBuildings: number;
  populationChange: number;
  developmentType: string;
}

export interface DevelopmentYear {
  year: string;
  builtUpArea: number;
  greenCover: number;
  population: number;
}

export interface LandUseChange {
  originalUse: string;
  currentUse: string;
  areaLost: number;
  impactLevel: string;
}

export interface DevelopmentHotspot {
  area: string;
  intensity: string;
  driver: string;
  infrastructureReadiness: string;
  environmentalImpact: string;
}

export interface LandCoverChange {
  urbanGrowthRate: number;
  forestLossRate: number;
  agriculturalChange: number;
  waterBodyChange: number;
  totalAreaKm2: number;
  dominantChange: string;
}

export interface UrbanGrowthDashboard {
  zones: ZoneGrowth[];
  metroLines: MetroLine[];
  growthStats: GrowthStat[];
  development: DevelopmentYear[];
  landUse: LandUseChange[];
  infrastructure: MetricTile[];
  hotspots: DevelopmentHotspot[];
  landCover: LandCoverChange;
  guidance: Guidance;
}

// ---- Community reports -----------------------------------------------------

export type ReportType =
  | 'Air Pollution'
  | 'Water Pollution'
  | 'Noise Pollution'
  | 'Waste Management'
  | 'Tree/Green Space'
  | 'Flooding'
  | 'Infrastructure'
  | 'Other';

export type ReportSeverity = 'Low' | 'Medium' | 'High' | 'Critical';

export type ReportStatus = 'Open' | 'Acknowledged' | 'Assigned' | 'In Progress' | 'Resolved' | 'Closed';

export type ReportPeriod = '24h' | '7d' | '30d' | 'all';

export interface CommunityReport {
  referenceId: string;
  type: ReportType;
  severity: ReportSeverity;
  status: ReportStatus;
  description: string;
  latitude: number;
  longitude: number;
  address: string | null;
  contact: string | null;
  anonymous: boolean;
  assignedTo: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface ReportProgress {
  steps: string[];
  currentStep: number;
  complete: boolean;
}

export interface TrackedReport {
  report: CommunityReport;
  progress: ReportProgress;
}

export interface ReportAnalytics {
  total: number;
  open: number;
  byType: Partial<Record<ReportType, number>>;
  byStatus: Partial<Record<ReportStatus, number>>;
  resolutionRate: number;
  averageSeverity: number;
}

// ---- Overview --------------------------------------------------------------

export interface SampleLocation {
  name: string;
  latitude: number;
  longitude: number;
  type: string;
  color: string;
}

export interface Alert {
  id: string;
  type: string;
  location: string;
  severity: 'High' | 'Moderate' | 'Low';
  createdAt: string;
  origin: 'seed' | 'rule';
}

export interface OverviewDashboard {
  city: CityInfo;
  metrics: MetricTile[];
  weather: Sourced<WeatherReading>;
  airQuality: Sourced<AirQualityReading>;
  locations: SampleLocation[];
  alerts: Alert[];
  validation: ValidationResult;
  dataSources: string[];
  lastUpdated: string;
  guidance: Guidance;
}

// ---- Assistant -------------------------------------------------------------

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface ChatResponse {
  status: 'ok' | 'unavailable';
  reply: string;
  suggestions: string[];
  contextSources: string[];
}

export interface InsightResponse {
  status: 'ok' | 'unavailable';
  text: string;
}
