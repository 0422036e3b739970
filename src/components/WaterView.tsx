import { useState } from 'react';
import { Droplets, Gauge, TrendingDown, Waves } from 'lucide-react';
import { Circle, CircleMarker, Popup } from 'react-leaflet';
import { CartesianGrid, Line, LineChart, ReferenceLine, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts';
import { mapColor } from '../constants';
import { fetchWater, useApi } from '../lib/api';
import type { CityInfo, StakeholderId, TrendLabel } from '../types';
import { CityMap } from './CityMap';
import { GuidancePanel } from './GuidancePanel';
import { MetricCard } from './MetricCard';
import { DataTable, ErrorState, LoadingState, Panel } from './Panel';

const TREND_STYLES: Record<TrendLabel, string> = {
  Improving: 'text-emerald-600',
  Stable: 'text-slate-500',
  Deteriorating: 'text-red-600',
};

export function WaterView({ stakeholder, audience, city }: { stakeholder: StakeholderId; audience: string; city: CityInfo }) {
  const { data, error, loading, reload } = useApi(signal => fetchWater(stakeholder, signal), [stakeholder]);
  const [selectedLake, setSelectedLake] = useState<string | null>(null);

  if (loading) return <LoadingState />;
  if (error || !data) return <ErrorState message={error ?? 'No data'} onRetry={reload} />;

  const trend = data.qualityTrend.find(t => t.lake === selectedLake) ?? data.qualityTrend[0];

  return (
    <div className="space-y-8">
      {data.supply && (
        <div className="grid grid-cols-1 sm:grid-cols-2 lg:grid-cols-4 gap-4">
          {data.supply.map(tile => <MetricCard key={tile.label} tile={tile} icon={<Gauge className="w-4 h-4" />} />)}
        </div>
      )}

      {!data.validation.valid && (
        <div className="p-4 rounded-2xl bg-red-50 border border-red-100 text-xs text-red-700 space-y-1">
          {data.validation.errors.map(message => <p key={message}>{message}</p>)}
        </div>
      )}

      <div className="grid grid-cols-1 lg:grid-cols-3 gap-8">
        <div className="lg:col-span-2 space-y-8">
          <Panel title="Lakes & Flood Zones" icon={<Waves className="w-5 h-5" />}>
            <CityMap city={city}>
              {data.floodZones.map(zone => (
                <Circle
                  key={zone.area}
                  center={[zone.latitude, zone.longitude]}
                  radius={1500}
                  pathOptions={{ color: mapColor(zone.color), fillColor: mapColor(zone.color), fillOpacity: 0.15, dashArray: '8, 8', weight: 2 }}
                >
                  <Popup>{zone.area}: {zone.risk} flood risk</Popup>
                </Circle>
              ))}
              {data.lakes.map(lake => (
                <CircleMarker
                  key={lake.id}
                  center={[lake.latitude, lake.longitude]}
                  radius={9}
                  eventHandlers={{ click: () => setSelectedLake(lake.name) }}
                  pathOptions={{ color: mapColor(lake.color), fillColor: mapColor(lake.color), fillOpacity: 0.7 }}
                >
                  <Popup>
                    <p className="font-bold">{lake.name}</p>
                    <p className="text-xs">Health {lake.healthScore}/10 ({lake.status})</p>
                  </Popup>
                </CircleMarker>
              ))}
            </CityMap>
          </Panel>

          {trend && (
            <Panel
              title={`${trend.lake} · 30-Day Health`}
              icon={<TrendingDown className="w-5 h-5" />}
              action={
                <select
                  value={trend.lake}
                  onChange={e => setSelectedLake(e.target.value)}
                  className="px-3 py-2 rounded-xl border border-slate-200 bg-white text-sm"
                >
                  {data.qualityTrend.map(t => <option key={t.lake} value={t.lake}>{t.lake}</option>)}
                </select>
              }
            >
              <div className="h-[240px] w-full">
                <ResponsiveContainer width="100%" height="100%">
                  <LineChart data={trend.series}>
                    <CartesianGrid strokeDasharray="3 3" vertical={false} stroke="#f1f5f9" />
                    <XAxis dataKey="date" hide />
                    <YAxis domain={[0, 10]} axisLine={false} tickLine={false} tick={{ fontSize: 10, fill: '#94a3b8' }} />
                    <Tooltip contentStyle={{ borderRadius: '16px', border: 'none', boxShadow: '0 10px 15px -3px rgb(0 0 0 / 0.1)' }} />
                    <ReferenceLine y={data.criticalThreshold} stroke="#ef4444" strokeDasharray="4 4" label={{ value: 'Critical', fontSize: 10, fill: '#ef4444' }} />
                    <Line type="monotone" dataKey="score" stroke="#3b82f6" strokeWidth={3} dot={false} />
                  </LineChart>
                </ResponsiveContainer>
              </div>
              <p className={`text-sm font-bold mt-4 ${TREND_STYLES[trend.trend]}`}>
                {trend.trend} · current {trend.current}/10 · {trend.changeRate > 0 ? '+' : ''}{trend.changeRate} over 30 days
              </p>
            </Panel>
          )}

          <Panel title="Flood Risk" icon={<Droplets className="w-5 h-5" />}>
            <DataTable
              rows={data.floodRisk}
              rowKey={row => row.area}
              columns={[
                { header: 'Area', cell: row => <span className="font-bold text-slate-800">{row.area}</span> },
                { header: 'Risk', cell: row => row.riskLevel },
                { header: 'Past floods', cell: row => row.historicalFloods },
                { header: 'Drainage', cell: row => row.drainageCapacity },
                { header: 'People at risk', cell: row => row.populationAtRisk.toLocaleString() },
              ]}
            />
          </Panel>
        </div>

        <div className="space-y-8">
          <GuidancePanel guidance={data.guidance} audience={audience} />
          <Panel title="Lake Health" icon={<Waves className="w-5 h-5" />}>
            <div className="space-y-3">
              {data.lakes.map(lake => (
                <button
                  key={lake.id}
                  onClick={() => setSelectedLake(lake.name)}
                  className="w-full text-left p-4 rounded-2xl bg-slate-50 border border-slate-100 hover:border-slate-300 transition-all"
                >
                  <div className="flex justify-between items-center">
                    <p className="font-bold text-sm text-slate-800">{lake.name}</p>
                    <span className="text-sm font-black" style={{ color: mapColor(lake.color) }}>{lake.healthScore}</span>
                  </div>
                  <p className="text-[10px] text-slate-400 mt-1">
                    WQI {lake.waterQualityIndex} · bloom risk {lake.algalBloomRisk} · {lake.pollutionLevel} pollution
                  </p>
                </button>
              ))}
            </div>
          </Panel>
        </div>
      </div>
    </div>
  );
}
