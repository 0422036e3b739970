import type { DataSource, Sourced } from '../types';

const STYLES: Record<DataSource, { label: string; className: string }> = {
  live: { label: 'Live', className: 'bg-emerald-50 text-emerald-700 border-emerald-100' },
  cached: { label: 'Cached', className: 'bg-amber-50 text-amber-700 border-amber-100' },
  fallback: { label: 'Fallback', className: 'bg-slate-100 text-slate-500 border-slate-200' },
};

/** Where a value came from and when; stale values carry the upstream error as a tooltip. */
export function SourceBadge({ value }: { value: Sourced<unknown> }) {
  const style = STYLES[value.source];
  const fetched = new Date(value.fetchedAt).toLocaleTimeString(undefined, { hour: '2-digit', minute: '2-digit' });
  return (
    <span
      title={value.error}
      className={`inline-flex items-center gap-1.5 px-3 py-1 rounded-full border text-[10px] font-bold uppercase tracking-wider ${style.className}`}
    >
      <span className={`w-1.5 h-1.5 rounded-full ${value.stale ? 'bg-amber-500' : 'bg-emerald-500'}`} />
      {style.label} · {fetched}
    </span>
  );
}
