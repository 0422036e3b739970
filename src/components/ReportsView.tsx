import { useState, type FormEvent } from 'react';
import { BarChart3, CheckCircle2, ClipboardList, Filter, MapPin, Search, Send } from 'lucide-react';
import { CircleMarker, Popup, useMapEvents } from 'react-leaflet';
import { mapColor } from '../constants';
import { PROGRESS_STEPS, REPORT_SEVERITIES, REPORT_STATUSES, REPORT_TYPES, severityColor } from '../lib/catalog';
import {
  ApiError,
  advanceReport,
  fetchGuidance,
  fetchReportAnalytics,
  fetchReports,
  submitReport,
  trackReport,
  useApi,
  type ReportQuery,
} from '../lib/api';
import type {
  CityInfo,
  CommunityReport,
  ReportPeriod,
  ReportSeverity,
  ReportStatus,
  ReportType,
  StakeholderId,
  TrackedReport,
} from '../types';
import { CityMap } from './CityMap';
import { GuidancePanel } from './GuidancePanel';
import { ErrorState, LoadingState, Panel } from './Panel';

const PERIODS: { id: ReportPeriod; label: string }[] = [
  { id: '24h', label: 'Last 24 hours' },
  { id: '7d', label: 'Last 7 days' },
  { id: '30d', label: 'Last 30 days' },
  { id: 'all', label: 'All time' },
];

const inputClass =
  'w-full px-4 py-3 rounded-2xl border border-slate-200 bg-white text-sm focus:outline-none focus:ring-2 focus:ring-emerald-500/20 focus:border-emerald-500 transition-all';

const nextStatus = (status: ReportStatus): ReportStatus | null =>
  REPORT_STATUSES[REPORT_STATUSES.indexOf(status) + 1] ?? null;

const isReportType = (value: string): value is ReportType => REPORT_TYPES.some(type => type === value);
const isSeverity = (value: string): value is ReportSeverity => REPORT_SEVERITIES.some(severity => severity === value);
const isStatus = (value: string): value is ReportStatus => REPORT_STATUSES.some(status => status === value);
const isPeriod = (value: string): value is ReportPeriod => PERIODS.some(period => period.id === value);

const messageOf = (err: unknown) => (err instanceof Error ? err.message : String(err));

function LocationPicker({ onPick }: { onPick: (latitude: number, longitude: number) => void }) {
  useMapEvents({
    click: event => onPick(Number(event.latlng.lat.toFixed(5)), Number(event.latlng.lng.toFixed(5))),
  });
  return null;
}

function ReportForm({ city, onSubmitted }: { city: CityInfo; onSubmitted: (report: CommunityReport) => void }) {
  const [type, setType] = useState<ReportType>('Air Pollution');
  const [severity, setSeverity] = useState<ReportSeverity>('Medium');
  const [description, setDescription] = useState('');
  const [position, setPosition] = useState({ latitude: city.latitude, longitude: city.longitude });
  const [address, setAddress] = useState('');
  const [contact, setContact] = useState('');
  const [anonymous, setAnonymous] = useState(false);
  const [submitting, setSubmitting] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const handleSubmit = (event: FormEvent) => {
    event.preventDefault();
    setSubmitting(true);
    setError(null);
    submitReport({
      type,
      severity,
      description,
      ...position,
      address: address.trim() || undefined,
      contact: anonymous ? undefined : contact.trim() || undefined,
      anonymous,
    })
      .then(report => {
        setDescription('');
        setAddress('');
        setContact('');
        onSubmitted(report);
      })
      .catch((err: unknown) => setError(messageOf(err)))
      .finally(() => setSubmitting(false));
  };

  return (
    <form onSubmit={handleSubmit} className="space-y-4">
      <div className="grid grid-cols-1 sm:grid-cols-2 gap-4">
        <select value={type} onChange={e => isReportType(e.target.value) && setType(e.target.value)} className={inputClass}>
          {REPORT_TYPES.map(t => <option key={t} value={t}>{t}</option>)}
        </select>
        <select value={severity} onChange={e => isSeverity(e.target.value) && setSeverity(e.target.value)} className={inputClass}>
          {REPORT_SEVERITIES.map(s => <option key={s} value={s}>{s}</option>)}
        </select>
      </div>
      <textarea
        required
        minLength={10}
        maxLength={2000}
        rows={4}
        placeholder="Describe what you saw (at least 10 characters)"
        value={description}
        onChange={e => setDescription(e.target.value)}
        className={inputClass}
      />
      <CityMap city={city} height="h-[220px]">
        <LocationPicker onPick={(latitude, longitude) => setPosition({ latitude, longitude })} />
        <CircleMarker center={[position.latitude, position.longitude]} radius={8} pathOptions={{ color: mapColor(severityColor(severity)) }} />
      </CityMap>
      <p className="text-[10px] font-mono text-slate-400">
        <MapPin className="inline w-3 h-3 mr-1" />
        {position.latitude}, {position.longitude} · click the map to move the pin
      </p>
      <input placeholder="Address or landmark (optional)" value={address} onChange={e => setAddress(e.target.value)} className={inputClass} />
      <label className="flex items-center gap-2 text-sm text-slate-600">
        <input type="checkbox" checked={anonymous} onChange={e => setAnonymous(e.target.checked)} />
        Submit anonymously
      </label>
      {!anonymous && (
        <input placeholder="Email or phone for updates (optional)" value={contact} onChange={e => setContact(e.target.value)} className={inputClass} />
      )}
      {error && <p className="text-xs text-red-600">{error}</p>}
      <button
        type="submit"
        disabled={submitting}
        className="w-full flex items-center justify-center gap-2 px-4 py-3 rounded-2xl bg-emerald-600 text-white text-sm font-bold shadow-lg shadow-emerald-200 hover:bg-emerald-700 disabled:opacity-50 transition-all"
      >
        <Send className="w-4 h-4" />
        {submitting ? 'Submitting…' : 'Submit report'}
      </button>
    </form>
  );
}

function ProgressTracker({ tracked }: { tracked: TrackedReport }) {
  const { report, progress } = tracked;
  return (
    <div className="space-y-4">
      <div>
        <p className="font-bold text-slate-800">{report.referenceId} · {report.type}</p>
        <p className="text-xs text-slate-500 mt-1">{report.description}</p>
        {report.assignedTo && <p className="text-xs text-slate-400 mt-1">Assigned to {report.assignedTo}</p>}
      </div>
      <ol className="space-y-2">
        {progress.steps.map((step, i) => (
          <li key={step} className={`flex items-center gap-2 text-xs ${i <= progress.currentStep ? 'text-emerald-700 font-bold' : 'text-slate-400'}`}>
            <CheckCircle2 className={`w-4 h-4 ${i <= progress.currentStep ? 'text-emerald-500' : 'text-slate-200'}`} />
            {step}
          </li>
        ))}
      </ol>
      {progress.complete && <p className="text-xs font-bold text-emerald-600">This report has been resolved.</p>}
    </div>
  );
}

export function ReportsView({ stakeholder, audience, city }: { stakeholder: StakeholderId; audience: string; city: CityInfo }) {
  const [filters, setFilters] = useState<ReportQuery>({ period: 'all' });
  const reports = useApi(signal => fetchReports(filters, signal), [filters.type, filters.status, filters.severity, filters.period]);
  const analytics = useApi(signal => fetchReportAnalytics(signal), []);
  const guidance = useApi(signal => fetchGuidance('reports', stakeholder, signal), [stakeholder]);
  const [referenceId, setReferenceId] = useState('');
  const [tracked, setTracked] = useState<TrackedReport | null>(null);
  const [trackError, setTrackError] = useState<string | null>(null);
  const [assignee, setAssignee] = useState('');
  const [notice, setNotice] = useState<string | null>(null);
  const canManage = stakeholder !== 'citizens';

  const refresh = () => {
    reports.reload();
    analytics.reload();
  };

  const lookup = (id: string) => {
    setTrackError(null);
    trackReport(id.trim())
      .then(setTracked)
      .catch((err: unknown) => {
        setTracked(null);
        setTrackError(err instanceof ApiError && err.status === 404 ? `No report with reference ${id.trim()}` : messageOf(err));
      });
  };

  const advance = (report: CommunityReport) => {
    const status = nextStatus(report.status);
    if (!status) return;
    advanceReport(report.referenceId, status, status === 'Assigned' ? assignee.trim() || undefined : undefined)
      .then(updated => {
        setNotice(`${updated.referenceId} moved to ${updated.status}`);
        refresh();
        if (tracked?.report.referenceId === updated.referenceId) lookup(updated.referenceId);
      })
      .catch((err: unknown) => setNotice(messageOf(err)));
  };

  return (
    <div className="grid grid-cols-1 lg:grid-cols-3 gap-8">
      <div className="lg:col-span-2 space-y-8">
        <Panel
          title="Community Reports"
          icon={<ClipboardList className="w-5 h-5" />}
          action={
            <div className="flex flex-wrap gap-2">
              <Filter className="w-4 h-4 text-slate-400 self-center" />
              <select
                value={filters.type ?? ''}
                onChange={e => setFilters({ ...filters, type: isReportType(e.target.value) ? e.target.value : undefined })}
                className="px-3 py-2 rounded-xl border border-slate-200 bg-white text-xs"
              >
                <option value="">All types</option>
                {REPORT_TYPES.map(t => <option key={t} value={t}>{t}</option>)}
              </select>
              <select
                value={filters.status ?? ''}
                onChange={e => setFilters({ ...filters, status: isStatus(e.target.value) ? e.target.value : undefined })}
                className="px-3 py-2 rounded-xl border border-slate-200 bg-white text-xs"
              >
                <option value="">All statuses</option>
                {REPORT_STATUSES.map(s => <option key={s} value={s}>{s}</option>)}
              </select>
              <select
                value={filters.severity ?? ''}
                onChange={e => setFilters({ ...filters, severity: isSeverity(e.target.value) ? e.target.value : undefined })}
                className="px-3 py-2 rounded-xl border border-slate-200 bg-white text-xs"
              >
                <option value="">All severities</option>
                {REPORT_SEVERITIES.map(s => <option key={s} value={s}>{s}</option>)}
              </select>
              <select
                value={filters.period ?? 'all'}
                onChange={e => setFilters({ ...filters, period: isPeriod(e.target.value) ? e.target.value : 'all' })}
                className="px-3 py-2 rounded-xl border border-slate-200 bg-white text-xs"
              >
                {PERIODS.map(p => <option key={p.id} value={p.id}>{p.label}</option>)}
              </select>
            </div>
          }
        >
          {reports.loading && <LoadingState />}
          {reports.error && <ErrorState message={reports.error} onRetry={reports.reload} />}
          {reports.data && (
            <div className="space-y-6">
              <CityMap city={city} height="h-[300px]">
                {reports.data.map(report => (
                  <CircleMarker
                    key={report.referenceId}
                    center={[report.latitude, report.longitude]}
                    radius={8}
                    pathOptions={{ color: mapColor(severityColor(report.severity)), fillColor: mapColor(severityColor(report.severity)), fillOpacity: 0.7 }}
                  >
                    <Popup>
                      <p className="font-bold">{report.referenceId}</p>
                      <p className="text-xs">{report.type} · {report.severity} · {report.status}</p>
                    </Popup>
                  </CircleMarker>
                ))}
              </CityMap>
              {notice && <p className="text-xs text-slate-500">{notice}</p>}
              {reports.data.length === 0 ? (
                <p className="text-sm text-slate-500">No reports match these filters.</p>
              ) : (
                <div className="space-y-3">
                  {reports.data.map(report => {
                    const next = nextStatus(report.status);
                    return (
                      <div key={report.referenceId} className="p-4 rounded-2xl bg-slate-50 border border-slate-100">
                        <div className="flex flex-wrap justify-between items-center gap-2">
                          <button onClick={() => { setReferenceId(report.referenceId); lookup(report.referenceId); }} className="font-bold text-sm text-slate-800 hover:text-emerald-700">
                            {report.referenceId} · {report.type}
                          </button>
                          <div className="flex items-center gap-2">
                            <span className="px-2 py-1 rounded-full text-[10px] font-bold text-white" style={{ backgroundColor: mapColor(severityColor(report.severity)) }}>
                              {report.severity}
                            </span>
                            <span className="px-2 py-1 rounded-full text-[10px] font-bold bg-white border border-slate-200 text-slate-600">{report.status}</span>
                          </div>
                        </div>
                        <p className="text-xs text-slate-500 mt-2">{report.description}</p>
                        <div className="flex flex-wrap justify-between items-center gap-2 mt-2">
                          <p className="text-[10px] text-slate-400">
                            {report.address ?? `${report.latitude}, ${report.longitude}`} · {new Date(report.createdAt).toLocaleString(undefined, { dateStyle: 'medium', timeStyle: 'short' })}
                          </p>
                          {canManage && next && (
                            <button onClick={() => advance(report)} className="px-3 py-1.5 rounded-xl bg-emerald-600 text-white text-[10px] font-bold hover:bg-emerald-700">
                              Move to {next}
                            </button>
                          )}
                        </div>
                      </div>
                    );
                  })}
                </div>
              )}
              {canManage && (
                <input
                  placeholder="Assign to (used when moving a report to Assigned)"
                  value={assignee}
                  onChange={e => setAssignee(e.target.value)}
                  className={inputClass}
                />
              )}
            </div>
          )}
        </Panel>
      </div>

      <div className="space-y-8">
        {guidance.data && <GuidancePanel guidance={guidance.data} audience={audience} />}
        <Panel title="Report an Issue" icon={<Send className="w-5 h-5" />}>
          <ReportForm
            city={city}
            onSubmitted={report => {
              setNotice(`Thank you. Your reference is ${report.referenceId}.`);
              setReferenceId(report.referenceId);
              lookup(report.referenceId);
              refresh();
            }}
          />
        </Panel>

        <Panel title="Track a Report" icon={<Search className="w-5 h-5" />}>
          <form
            onSubmit={e => {
              e.preventDefault();
              lookup(referenceId);
            }}
            className="flex gap-2 mb-4"
          >
            <input placeholder="CR-2026-0001" value={referenceId} onChange={e => setReferenceId(e.target.value)} className={inputClass} />
            <button type="submit" className="px-4 rounded-2xl bg-slate-900 text-white text-sm font-bold">Track</button>
          </form>
          {trackError && <p className="text-xs text-red-600">{trackError}</p>}
          {tracked ? (
            <ProgressTracker tracked={tracked} />
          ) : (
            <p className="text-xs text-slate-400">Steps: {PROGRESS_STEPS.join(' → ')}</p>
          )}
        </Panel>

        <Panel title="Analytics" icon={<BarChart3 className="w-5 h-5" />}>
          {analytics.loading && <LoadingState />}
          {analytics.error && <ErrorState message={analytics.error} onRetry={analytics.reload} />}
          {analytics.data && (
            <div className="space-y-4">
              <div className="grid grid-cols-2 gap-3">
                <div className="p-3 rounded-2xl bg-slate-50 border border-slate-100">
                  <p className="text-[10px] font-bold text-slate-400 uppercase tracking-widest">Total</p>
                  <p className="text-xl font-black text-slate-800">{analytics.data.total}</p>
                </div>
                <div className="p-3 rounded-2xl bg-slate-50 border border-slate-100">
                  <p className="text-[10px] font-bold text-slate-400 uppercase tracking-widest">Open</p>
                  <p className="text-xl font-black text-slate-800">{analytics.data.open}</p>
                </div>
                <div className="p-3 rounded-2xl bg-slate-50 border border-slate-100">
                  <p className="text-[10px] font-bold text-slate-400 uppercase tracking-widest">Resolved</p>
                  <p className="text-xl font-black text-emerald-600">{analytics.data.resolutionRate}%</p>
                </div>
                <div className="p-3 rounded-2xl bg-slate-50 border border-slate-100">
                  <p className="text-[10px] font-bold text-slate-400 uppercase tracking-widest">Avg severity</p>
                  <p className="text-xl font-black text-slate-800">{analytics.data.averageSeverity}</p>
                </div>
              </div>
              <ul className="space-y-1 text-xs">
                {Object.entries(analytics.data.byType).map(([type, count]) => (
                  <li key={type} className="flex justify-between text-slate-600"><span>{type}</span><span className="font-bold">{count}</span></li>
                ))}
              </ul>
            </div>
          )}
        </Panel>
      </div>
    </div>
  );
}
