import { useState } from 'react';
import { Leaf, Users } from 'lucide-react';
import { motion, AnimatePresence } from 'motion/react';
import { AirQualityView } from './components/AirQualityView';
import { AssistantView } from './components/AssistantView';
import { HeatView } from './components/HeatView';
import { OverviewView } from './components/OverviewView';
import { ErrorState, LoadingState } from './components/Panel';
import { ReportsView } from './components/ReportsView';
import { UrbanGrowthView } from './components/UrbanGrowthView';
import { WaterView } from './components/WaterView';
import { MODULES } from './constants';
import { fetchCity, useApi } from './lib/api';
import { STAKEHOLDERS, stakeholderLabel } from './lib/catalog';
import type { CityInfo, ModuleId, StakeholderId } from './types';

const isStakeholder = (value: string): value is StakeholderId => STAKEHOLDERS.some(s => s.id === value);

interface ViewProps {
  stakeholder: StakeholderId;
  audience: string;
  city: CityInfo;
}

function ModuleView({ module, ...props }: ViewProps & { module: ModuleId }) {
  switch (module) {
    case 'overview': return <OverviewView {...props} />;
    case 'heat': return <HeatView {...props} />;
    case 'water': return <WaterView {...props} />;
    case 'air': return <AirQualityView {...props} />;
    case 'growth': return <UrbanGrowthView {...props} />;
    case 'reports': return <ReportsView {...props} />;
    case 'assistant': return <AssistantView {...props} />;
  }
}

export default function App() {
  // ---- Application State ---------------------------------------------------

  /** Active page shown in the main content area. */
  const [view, setView] = useState<ModuleId>('overview');
  /** Audience every view tailors its recommendations to. */
  const [stakeholder, setStakeholder] = useState<StakeholderId>('citizens');
  const city = useApi(signal => fetchCity(signal), []);

  const active = MODULES.find(m => m.id === view) ?? MODULES[0];
  const audience = stakeholderLabel(stakeholder);

  // ---- Render ---------------------------------------------------------------

  return (
    <div className="min-h-screen bg-[#F8F9FA] text-slate-900 font-sans">
      {/* Navigation */}
      <nav className="bg-white border-b border-slate-200 sticky top-0 z-50">
        <div className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8">
          <div className="flex flex-col lg:flex-row justify-between gap-3 py-3 lg:h-16 lg:py-0 lg:items-center">
            <div className="flex items-center gap-2">
              <div className="bg-emerald-600 p-2 rounded-lg">
                <Leaf className="text-white w-6 h-6" />
              </div>
              <span className="text-xl font-bold tracking-tight text-slate-800">
                {city.data ? `${city.data.name} Climate Resilience` : 'Climate Resilience'}
              </span>
            </div>
            <div className="flex flex-wrap gap-2">
              {MODULES.map(module => (
                <button
                  key={module.id}
                  onClick={() => setView(module.id)}
                  className={`px-4 py-2 rounded-full text-sm font-medium transition-all flex items-center gap-2 ${view === module.id ? 'bg-emerald-50 text-emerald-700' : 'text-slate-500 hover:bg-slate-50'}`}
                >
                  {module.icon}
                  {module.label}
                </button>
              ))}
            </div>
          </div>
        </div>
      </nav>

      <main className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8 py-8 space-y-8">
        <div className="flex flex-col md:flex-row gap-6 items-start md:items-center justify-between">
          <div>
            <h1 className="text-2xl md:text-3xl font-black text-slate-800 tracking-tight">{active.label}</h1>
            <p className="text-sm text-slate-500 mt-1">{active.blurb}</p>
          </div>
          <label className="relative w-full md:w-80">
            <Users className="absolute left-4 top-1/2 -translate-y-1/2 w-4 h-4 text-slate-400" />
            <select
              value={stakeholder}
              onChange={e => isStakeholder(e.target.value) && setStakeholder(e.target.value)}
              className="w-full pl-11 pr-4 py-3 rounded-2xl border border-slate-200 bg-white focus:outline-none focus:ring-2 focus:ring-emerald-500/20 focus:border-emerald-500 transition-all shadow-sm text-sm"
            >
              {STAKEHOLDERS.map(s => <option key={s.id} value={s.id}>{s.label}</option>)}
            </select>
          </label>
        </div>

        {city.loading && <LoadingState />}
        {city.error && <ErrorState message={city.error} onRetry={city.reload} />}
        {city.data && (
          <AnimatePresence mode="wait">
            <motion.div
              key={`${view}-${stakeholder}`}
              initial={{ opacity: 0, y: 20 }}
              animate={{ opacity: 1, y: 0 }}
              exit={{ opacity: 0, y: -20 }}
            >
              <ModuleView module={view} stakeholder={stakeholder} audience={audience} city={city.data} />
            </motion.div>
          </AnimatePresence>
        )}
      </main>
    </div>
  );
}
