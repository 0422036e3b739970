import type { ModuleId, ReportSeverity, ReportStatus, ReportType, StakeholderId } from '../types';

export const STAKEHOLDERS = [
  { id: 'citizens', label: 'Citizens' },
  { id: 'city-planning', label: 'BBMP (City Planning)' },
  { id: 'water-board', label: 'BWSSB (Water Board)' },
  { id: 'electricity', label: 'BESCOM (Electricity)' },
  { id: 'parks', label: 'Parks Department' },
  { id: 'researchers', label: 'Researchers' },
] as const satisfies readonly { id: StakeholderId; label: string }[];

export const STAKEHOLDER_IDS = [
  'citizens',
  'city-planning',
  'water-board',
  'electricity',
  'parks',
  'researchers',
] as const satisfies readonly StakeholderId[];

export const MODULE_IDS = [
  'overview',
  'heat',
  'water',
  'air',
  'growth',
  'reports',
  'assistant',
] as const satisfies readonly ModuleId[];

export const REPORT_TYPES = [
  'Air Pollution',
  'Water Pollution',
  'Noise Pollution',
  'Waste Management',
  'Tree/Green Space',
  'Flooding',
  'Infrastructure',
  'Other',
] as const satisfies readonly ReportType[];

export const REPORT_SEVERITIES = ['Low', 'Medium', 'High', 'Critical'] as const satisfies readonly ReportSeverity[];

/** Lifecycle order; a report only ever moves to the right. */
export const REPORT_STATUSES = [
  'Open',
  'Acknowledged',
  'Assigned',
  'In Progress',
  'Resolved',
  'Closed',
] as const satisfies readonly ReportStatus[];

export const PROGRESS_STEPS = ['Submitted', 'Acknowledged', 'Assigned', 'In Progress', 'Resolved'] as const;

export const stakeholderLabel = (id: StakeholderId) =>
  STAKEHOLDERS.find(stakeholder => stakeholder.id === id)?.label ?? id;

/** Marker colour for a community report. */
export const severityColor = (severity: ReportSeverity) => {
  switch (severity) {
    case 'Critical': return 'red';
    case 'High': return 'orange';
    case 'Medium': return 'yellow';
    case 'Low': return 'green';
  }
};
