import { useState, type ReactNode } from 'react';
import { Loader2, Sparkles } from 'lucide-react';
import { explainDataPoint } from '../lib/api';
import type { MetricTile } from '../types';

/** A headline number. With `explainable`, the assistant can describe it in plain words. */
export function MetricCard({ tile, icon, explainable = false }: { tile: MetricTile; icon?: ReactNode; explainable?: boolean }) {
  const [explanation, setExplanation] = useState<string | null>(null);
  const [pending, setPending] = useState(false);
  const negative = tile.delta.startsWith('-');

  const explain = () => {
    setPending(true);
    explainDataPoint(tile.label, tile.value, tile.delta)
      .then(response => setExplanation(response.text))
      .catch((err: unknown) => setExplanation(err instanceof Error ? err.message : String(err)))
      .finally(() => setPending(false));
  };

  return (
    <div className="p-5 rounded-2xl md:rounded-3xl bg-white border border-slate-100 shadow-sm">
      <div className="flex items-center justify-between">
        <p className="text-[10px] font-bold text-slate-400 uppercase tracking-widest">{tile.label}</p>
        {icon && <span className="text-slate-300">{icon}</span>}
      </div>
      <p className="text-2xl md:text-3xl font-black text-slate-800 mt-3">{tile.value}</p>
      <p className={`text-xs font-medium mt-1 ${negative ? 'text-red-500' : 'text-slate-500'}`}>{tile.delta}</p>
      {explainable && (
        <button
          onClick={explain}
          disabled={pending}
          className="mt-3 flex items-center gap-1 text-[10px] font-bold uppercase tracking-widest text-emerald-600 disabled:opacity-50"
        >
          {pending ? <Loader2 className="w-3 h-3 animate-spin" /> : <Sparkles className="w-3 h-3" />}
          Explain
        </button>
      )}
      {explanation && <p className="text-xs text-slate-500 mt-2 leading-relaxed whitespace-pre-wrap">{explanation}</p>}
    </div>
  );
}
