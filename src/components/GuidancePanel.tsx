import { CheckCircle2, Info } from 'lucide-react';
import type { Guidance } from '../types';

export function GuidancePanel({ guidance, audience }: { guidance: Guidance; audience: string }) {
  return (
    <div className="bg-slate-900 rounded-2xl md:rounded-[2rem] p-6 md:p-8 text-white shadow-xl shadow-slate-200">
      <div className="flex items-center gap-3 mb-4">
        <div className="p-2 bg-emerald-500 rounded-xl">
          <Info className="w-5 h-5 text-white" />
        </div>
        <div>
          <p className="text-[10px] font-bold text-emerald-400 uppercase tracking-widest">For {audience}</p>
          <h3 className="text-lg font-bold">Recommendations</h3>
        </div>
      </div>
      <p className="text-sm text-slate-300 leading-relaxed">{guidance.focus}</p>
      {guidance.actions.length > 0 && (
        <ul className="mt-5 space-y-3">
          {guidance.actions.map(action => (
            <li key={action} className="flex gap-3 p-3 rounded-2xl bg-white/5 border border-white/10 text-xs text-slate-200">
              <CheckCircle2 className="w-4 h-4 text-emerald-400 shrink-0" />
              {action}
            </li>
          ))}
        </ul>
      )}
    </div>
  );
}
