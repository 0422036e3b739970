import { useEffect, useState } from 'react';
import type {
  AirQualityDashboard,
  ChatMessage,
  CityInfo,
  ChatResponse,
  CommunityReport,
  Guidance,
  HeatDashboard,
  InsightResponse,
  ModuleId,
  OverviewDashboard,
  ReportAnalytics,
  ReportPeriod,
  ReportSeverity,
  ReportStatus,
  ReportType,
  StakeholderId,
  TrackedReport,
  UrbanGrowthDashboard,
  WaterDashboard,
} from '../types';

/** Error body returned by the API: `{ error, details? }`. */
export class ApiError extends Error {
  constructor(message: string, readonly status: number) {
    super(message);
    this.name = 'ApiError';
  }
}

async function readError(res: Response): Promise<ApiError> {
  const body: unknown = await res.json().catch(() => null);
  if (body && typeof body === 'object' && 'error' in body && typeof body.error === 'string') {
    return new ApiError(body.error, res.status);
  }
  return new ApiError(`Request failed with ${res.status}`, res.status);
}

async function request<T>(path: string, init: RequestInit = {}): Promise<T> {
  const res = await fetch(path, {
    ...init,
    headers: init.body ? { 'Content-Type': 'application/json' } : undefined,
  });
  if (!res.ok) throw await readError(res);
  return res.json();
}

const query = (params: Record<string, string | undefined>) => {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value) search.set(key, value);
  }
  const text = search.toString();
  return text ? `?${text}` : '';
};

// ---- Dashboards ------------------------------------------------------------

export const fetchCity = (signal?: AbortSignal) => request<CityInfo>('/api/city', { signal });

export const fetchGuidance = (module: ModuleId, stakeholder: StakeholderId, signal?: AbortSignal) =>
  request<Guidance>(`/api/guidance/${module}${query({ stakeholder })}`, { signal });

export const fetchOverview = (stakeholder: StakeholderId, signal?: AbortSignal) =>
  request<OverviewDashboard>(`/api/overview${query({ stakeholder })}`, { signal });

export const fetchHeat = (stakeholder: StakeholderId, signal?: AbortSignal) =>
  request<HeatDashboard>(`/api/heat${query({ stakeholder })}`, { signal });

export const fetchWater = (stakeholder: StakeholderId, signal?: AbortSignal) =>
  request<WaterDashboard>(`/api/water${query({ stakeholder })}`, { signal });

export const fetchAirQuality = (stakeholder: StakeholderId, signal?: AbortSignal) =>
  request<AirQualityDashboard>(`/api/air-quality${query({ stakeholder })}`, { signal });

export const fetchUrbanGrowth = (stakeholder: StakeholderId, signal?: AbortSignal) =>
  request<UrbanGrowthDashboard>(`/api/urban-growth${query({ stakeholder })}`, { signal });

// ---- Community reports -----------------------------------------------------

export interface ReportQuery {
  type?: ReportType;
  status?: ReportStatus;
  severity?: ReportSeverity;
  period?: ReportPeriod;
}

export interface ReportSubmission {
  type: ReportType;
  severity: ReportSeverity;
  description: string;
  latitude: number;
  longitude: number;
  address?: string;
  contact?: string;
  anonymous: boolean;
}

export const fetchReports = (filters: ReportQuery, signal?: AbortSignal) =>
  request<CommunityReport[]>(`/api/reports${query({ ...filters })}`, { signal });

export const fetchReportAnalytics = (signal?: AbortSignal) =>
  request<ReportAnalytics>('/api/reports/analytics', { signal });

export const trackReport = (referenceId: string) =>
  request<TrackedReport>(`/api/reports/${encodeURIComponent(referenceId)}`);

export const submitReport = (report: ReportSubmission) =>
  request<CommunityReport>('/api/reports', { method: 'POST', body: JSON.stringify(report) });

export const advanceReport = (referenceId: string, status: ReportStatus, assignedTo?: string) =>
  request<CommunityReport>(`/api/reports/${encodeURIComponent(referenceId)}`, {
    method: 'PATCH',
    body: JSON.stringify({ status, assignedTo }),
  });

// ---- Assistant -------------------------------------------------------------

export const sendChat = (messages: ChatMessage[], stakeholder: StakeholderId) =>
  request<ChatResponse>('/api/chat', { method: 'POST', body: JSON.stringify({ messages, stakeholder }) });

export const fetchDailySummary = (signal?: AbortSignal) =>
  request<InsightResponse>('/api/insights/daily-summary', { signal });

export const explainDataPoint = (dataType: string, value: number | string, context?: string) =>
  request<InsightResponse>('/api/insights/explain', { method: 'POST', body: JSON.stringify({ dataType, value, context }) });

// ---- Hook ------------------------------------------------------------------

export interface Loadable<T> {
  data: T | null;
  error: string | null;
  loading: boolean;
}

/**
 * Run `load` whenever `deps` change. Clears stale data first and aborts the
 * in-flight request on rapid switches.
 */
export function useApi<T>(load: (signal: AbortSignal) => Promise<T>, deps: readonly unknown[]): Loadable<T> & { reload: () => void } {
  const [state, setState] = useState<Loadable<T>>({ data: null, error: null, loading: true });
  const [version, setVersion] = useState(0);

  useEffect(() => {
    const controller = new AbortController();
    setState({ data: null, error: null, loading: true });
    load(controller.signal)
      .then(data => setState({ data, error: null, loading: false }))
      .catch((err: unknown) => {
        if (err instanceof DOMException && err.name === 'AbortError') return;
        console.error('API request failed:', err);
        setState({ data: null, error: err instanceof Error ? err.message : String(err), loading: false });
      });
    return () => controller.abort();
  }, [...deps, version]);

  return { ...state, reload: () => setVersion(v => v + 1) };
}
