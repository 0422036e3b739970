import { z } from 'zod';
import { PROGRESS_STEPS, REPORT_SEVERITIES, REPORT_STATUSES, REPORT_TYPES } from '../../lib/catalog';
import { round } from '../../lib/random';
import type {
  CommunityReport,
  ReportAnalytics,
  ReportPeriod,
  ReportProgress,
  ReportSeverity,
  ReportStatus,
  ReportType,
  TrackedReport,
} from '../../types';
import type { Db } from '../db';

/** City bounding box; reports outside it are rejected. */
export const CITY_BOUNDS = { minLatitude: 12.7, maxLatitude: 13.3, minLongitude: 77.3, maxLongitude: 77.9 } as const;

const ONE_HOUR_MS = 60 * 60 * 1000;

const PERIOD_HOURS: Record<Exclude<ReportPeriod, 'all'>, number> = { '24h': 24, '7d': 24 * 7, '30d': 24 * 30 };

const SEVERITY_WEIGHT: Record<ReportSeverity, number> = { Low: 1, Medium: 2, High: 3, Critical: 4 };

export const NewReportSchema = z.object({
  type: z.enum(REPORT_TYPES),
  severity: z.enum(REPORT_SEVERITIES),
  description: z.string().trim().min(10).max(2000),
  latitude: z.number()
    .min(CITY_BOUNDS.minLatitude, 'Location is outside the city')
    .max(CITY_BOUNDS.maxLatitude, 'Location is outside the city'),
  longitude: z.number()
    .min(CITY_BOUNDS.minLongitude, 'Location is outside the city')
    .max(CITY_BOUNDS.maxLongitude, 'Location is outside the city'),
  address: z.string().trim().max(300).optional(),
  contact: z.string().trim().max(200).optional(),
  anonymous: z.boolean().default(false),
});

export const ReportFiltersSchema = z.object({
  type: z.enum(REPORT_TYPES).optional(),
  status: z.enum(REPORT_STATUSES).optional(),
  severity: z.enum(REPORT_SEVERITIES).optional(),
  period: z.enum(['24h', '7d', '30d', 'all']).default('all'),
});

export const StatusUpdateSchema = z.object({
  status: z.enum(REPORT_STATUSES),
  assignedTo: z.string().trim().min(1).max(200).optional(),
});

export type NewReport = z.infer<typeof NewReportSchema>;
export type ReportFilters = z.infer<typeof ReportFiltersSchema>;
export type StatusUpdate = z.infer<typeof StatusUpdateSchema>;

export class ReportNotFoundError extends Error {
  constructor(readonly referenceId: string) {
    super(`Report ${referenceId} not found`);
    this.name = 'ReportNotFoundError';
  }
}

export class InvalidTransitionError extends Error {
  constructor(readonly from: ReportStatus, readonly to: ReportStatus) {
    super(`Cannot move a report from ${from} to ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

interface ReportRow {
  reference_id: string;
  type: ReportType;
  severity: ReportSeverity;
  status: ReportStatus;
  description: string;
  latitude: number;
  longitude: number;
  address: string | null;
  contact: string | null;
  anonymous: number;
  assigned_to: string | null;
  created_at: string;
  updated_at: string;
}

const toReport = (row: ReportRow): CommunityReport => ({
  referenceId: row.reference_id,
  type: row.type,
  severity: row.severity,
  status: row.status,
  description: row.description,
  latitude: row.latitude,
  longitude: row.longitude,
  address: row.address,
  contact: row.contact,
  anonymous: row.anonymous === 1,
  assignedTo: row.assigned_to,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

/** Next `CR-<year>-<NNNN>` id; numbering restarts at 0001 each year. */
export function nextReferenceId(db: Db, year: number): string {
  const prefix = `CR-${year}-`;
  const row = db
    .prepare<[number, string], { last: number | null }>(
      'SELECT MAX(CAST(substr(reference_id, ?) AS INTEGER)) AS last FROM community_reports WHERE reference_id LIKE ?',
    )
    .get(prefix.length + 1, `${prefix}%`);
  const next = (row?.last ?? 0) + 1;
  return `${prefix}${String(next).padStart(4, '0')}`;
}

export interface ReportInsert {
  type: ReportType;
  severity: ReportSeverity;
  status?: ReportStatus;
  description: string;
  latitude: number;
  longitude: number;
  address: string | null;
  contact: string | null;
  anonymous: boolean;
}

export function insertReport(db: Db, input: ReportInsert, createdAt: Date = new Date()): CommunityReport {
  const referenceId = nextReferenceId(db, createdAt.getUTCFullYear());
  const timestamp = createdAt.toISOString();
  db.prepare(
    `INSERT INTO community_reports
      (reference_id, type, severity, status, description, latitude, longitude, address, contact, anonymous, assigned_to, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, NULL, ?, ?)`,
  ).run(
    referenceId, input.type, input.severity, input.status ?? 'Open', input.description,
    input.latitude, input.longitude, input.address, input.anonymous ? null : input.contact,
    input.anonymous ? 1 : 0, timestamp, timestamp,
  );
  return getReport(db, referenceId);
}

/** Store a validated submission. Anonymous reports keep no contact details. */
export const submitReport = (db: Db, input: NewReport, now: Date = new Date()) =>
  insertReport(db, {
    type: input.type,
    severity: input.severity,
    description: input.description,
    latitude: input.latitude,
    longitude: input.longitude,
    address: input.address ?? null,
    contact: input.contact ?? null,
    anonymous: input.anonymous,
  }, now);

export function getReport(db: Db, referenceId: string): CommunityReport {
  const row = db.prepare<[string], ReportRow>('SELECT * FROM community_reports WHERE reference_id = ?').get(referenceId);
  if (!row) throw new ReportNotFoundError(referenceId);
  return toReport(row);
}

/** Newest first. */
export function listReports(db: Db, filters: ReportFilters, now: Date = new Date()): CommunityReport[] {
  const clauses: string[] = [];
  const params: (string | number)[] = [];

  if (filters.type) {
    clauses.push('type = ?');
    params.push(filters.type);
  }
  if (filters.status) {
    clauses.push('status = ?');
    params.push(filters.status);
  }
  if (filters.severity) {
    clauses.push('severity = ?');
    params.push(filters.severity);
  }
  if (filters.period !== 'all') {
    clauses.push('created_at >= ?');
    params.push(new Date(now.getTime() - PERIOD_HOURS[filters.period] * ONE_HOUR_MS).toISOString());
  }

  const where = clauses.length ? `WHERE ${clauses.join(' AND ')}` : '';
  return db
    .prepare<(string | number)[], ReportRow>(`SELECT * FROM community_reports ${where} ORDER BY created_at DESC, reference_id DESC`)
    .all(...params)
    .map(toReport);
}

export function getReportProgress(status: ReportStatus): ReportProgress {
  const steps = [...PROGRESS_STEPS];
  let currentStep: number;
  if (status === 'Open') currentStep = 0;
  else if (status === 'Closed') currentStep = steps.length - 1;
  else currentStep = steps.indexOf(status);
  return { steps, currentStep, complete: status === 'Resolved' || status === 'Closed' };
}

export function trackReport(db: Db, referenceId: string): TrackedReport {
  const report = getReport(db, referenceId);
  return { report, progress: getReportProgress(report.status) };
}

/** Statuses only move forward through the lifecycle. */
export function updateReportStatus(db: Db, referenceId: string, update: StatusUpdate, now: Date = new Date()): CommunityReport {
  const current = getReport(db, referenceId);
  if (REPORT_STATUSES.indexOf(update.status) <= REPORT_STATUSES.indexOf(current.status)) {
    throw new InvalidTransitionError(current.status, update.status);
  }
  db.prepare('UPDATE community_reports SET status = ?, assigned_to = ?, updated_at = ? WHERE reference_id = ?').run(
    update.status, update.assignedTo ?? current.assignedTo, now.toISOString(), referenceId,
  );
  return getReport(db, referenceId);
}

export function getReportAnalytics(db: Db): ReportAnalytics {
  const reports = db.prepare<[], ReportRow>('SELECT * FROM community_reports').all().map(toReport);
  const byType: ReportAnalytics['byType'] = {};
  const byStatus: ReportAnalytics['byStatus'] = {};
  let closed = 0;
  let severityTotal = 0;

  for (const report of reports) {
    byType[report.type] = (byType[report.type] ?? 0) + 1;
    byStatus[report.status] = (byStatus[report.status] ?? 0) + 1;
    if (report.status === 'Resolved' || report.status === 'Closed') closed++;
    severityTotal += SEVERITY_WEIGHT[report.severity];
  }

  const total = reports.length;
  return {
    total,
    open: total - closed,
    byType,
    byStatus,
    resolutionRate: total ? round((closed / total) * 100, 1) : 0,
    averageSeverity: total ? round(severityTotal / total, 2) : 0,
  };
}
