import type { ReactNode } from 'react';
import { AlertTriangle, Loader2 } from 'lucide-react';

interface PanelProps {
  title: string;
  icon?: ReactNode;
  action?: ReactNode;
  className?: string;
  children: ReactNode;
}

/** White card used for every dashboard section. */
export function Panel({ title, icon, action, className = '', children }: PanelProps) {
  return (
    <section className={`bg-white rounded-2xl md:rounded-[2rem] p-6 md:p-8 shadow-sm border border-slate-100 ${className}`}>
      <div className="flex flex-col sm:flex-row justify-between items-start sm:items-center gap-3 mb-6">
        <div className="flex items-center gap-3">
          {icon && <div className="p-2 bg-emerald-50 text-emerald-600 rounded-xl">{icon}</div>}
          <h3 className="text-lg font-bold text-slate-800">{title}</h3>
        </div>
        {action}
      </div>
      {children}
    </section>
  );
}

export function LoadingState({ label = 'Loading data…' }: { label?: string }) {
  return (
    <div className="flex items-center justify-center gap-3 py-24 text-slate-400">
      <Loader2 className="w-5 h-5 animate-spin" />
      <span className="text-sm font-medium">{label}</span>
    </div>
  );
}

export function ErrorState({ message, onRetry }: { message: string; onRetry?: () => void }) {
  return (
    <div className="p-6 rounded-2xl bg-red-50 border border-red-100 flex items-start gap-4">
      <AlertTriangle className="w-5 h-5 text-red-500 shrink-0 mt-0.5" />
      <div className="flex-1">
        <p className="font-bold text-red-800 text-sm">Could not load this view</p>
        <p className="text-xs text-red-600 mt-1">{message}</p>
      </div>
      {onRetry && (
        <button onClick={onRetry} className="px-3 py-1.5 rounded-xl bg-white border border-red-200 text-xs font-bold text-red-700 hover:bg-red-100">
          Retry
        </button>
      )}
    </div>
  );
}

/** Simple striped table; `columns` pairs a header with a cell renderer. */
export function DataTable<T>({ rows, columns, rowKey }: {
  rows: T[];
  columns: { header: string; cell: (row: T) => ReactNode }[];
  rowKey: (row: T) => string;
}) {
  return (
    <div className="overflow-x-auto">
      <table className="w-full text-sm">
        <thead>
          <tr className="text-left text-[10px] font-bold text-slate-400 uppercase tracking-widest">
            {columns.map(column => <th key={column.header} className="pb-3 pr-4">{column.header}</th>)}
          </tr>
        </thead>
        <tbody>
          {rows.map(row => (
            <tr key={rowKey(row)} className="border-t border-slate-100">
              {columns.map(column => <td key={column.header} className="py-3 pr-4 text-slate-600">{column.cell(row)}</td>)}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}
