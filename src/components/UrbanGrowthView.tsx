import { Building2, Gauge, Layers, TrendingUp, TrainFront } from 'lucide-react';
import { CircleMarker, Polyline, Popup } from 'react-leaflet';
import { Bar, BarChart, CartesianGrid, Legend, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts';
import { mapColor } from '../constants';
import { fetchUrbanGrowth, useApi } from '../lib/api';
import type { CityInfo, StakeholderId } from '../types';
import { CityMap } from './CityMap';
import { GuidancePanel } from './GuidancePanel';
import { MetricCard } from './MetricCard';
import { DataTable, ErrorState, LoadingState, Panel } from './Panel';

export function UrbanGrowthView({ stakeholder, audience, city }: { stakeholder: StakeholderId; audience: string; city: CityInfo }) {
  const { data, error, loading, reload } = useApi(signal => fetchUrbanGrowth(stakeholder, signal), [stakeholder]);

  if (loading) return <LoadingState />;
  if (error || !data) return <ErrorState message={error ?? 'No data'} onRetry={reload} />;

  const { landCover } = data;
  const changeRates = [
    { label: 'Urban growth', value: landCover.urbanGrowthRate },
    { label: 'Forest loss', value: landCover.forestLossRate },
    { label: 'Agricultural', value: landCover.agriculturalChange },
    { label: 'Water bodies', value: landCover.waterBodyChange },
  ];

  return (
    <div className="space-y-8">
      <div className="grid grid-cols-2 md:grid-cols-3 lg:grid-cols-6 gap-4">
        {data.infrastructure.map(tile => <MetricCard key={tile.label} tile={tile} icon={<Gauge className="w-4 h-4" />} />)}
      </div>

      <div className="grid grid-cols-1 lg:grid-cols-3 gap-8">
        <div className="lg:col-span-2 space-y-8">
          <Panel title="Development Zones" icon={<TrainFront className="w-5 h-5" />}>
            <CityMap city={city}>
              {data.metroLines.map(line => (
                <Polyline key={line.name} positions={line.path} pathOptions={{ color: mapColor(line.color), weight: 4, opacity: 0.8 }}>
                  <Popup>{line.name}</Popup>
                </Polyline>
              ))}
              {data.zones.map(zone => (
                <CircleMarker
                  key={zone.zone}
                  center={[zone.latitude, zone.longitude]}
                  radius={zone.radius}
                  pathOptions={{ color: mapColor(zone.color), fillColor: mapColor(zone.color), fillOpacity: 0.6 }}
                >
                  <Popup>
                    <p className="font-bold">{zone.zone}</p>
                    <p className="text-xs">{zone.status} · {zone.growthRate}% a year</p>
                  </Popup>
                </CircleMarker>
              ))}
            </CityMap>
          </Panel>

          <Panel title="Built-up Area vs Green Cover (km²)" icon={<TrendingUp className="w-5 h-5" />}>
            <div className="h-[260px] w-full">
              <ResponsiveContainer width="100%" height="100%">
                <BarChart data={data.development}>
                  <CartesianGrid strokeDasharray="3 3" vertical={false} stroke="#f1f5f9" />
                  <XAxis dataKey="year" tick={{ fontSize: 10, fill: '#94a3b8' }} axisLine={false} tickLine={false} />
                  <YAxis axisLine={false} tickLine={false} tick={{ fontSize: 10, fill: '#94a3b8' }} />
                  <Tooltip contentStyle={{ borderRadius: '16px', border: 'none', boxShadow: '0 10px 15px -3px rgb(0 0 0 / 0.1)' }} />
                  <Legend wrapperStyle={{ fontSize: 11 }} />
                  <Bar dataKey="builtUpArea" name="Built-up" fill="#f97316" radius={[6, 6, 0, 0]} />
                  <Bar dataKey="greenCover" name="Green cover" fill="#10b981" radius={[6, 6, 0, 0]} />
                </BarChart>
              </ResponsiveContainer>
            </div>
          </Panel>

          <Panel title="Zone Growth" icon={<Building2 className="w-5 h-5" />}>
            <DataTable
              rows={data.growthStats}
              rowKey={row => row.zone}
              columns={[
                { header: 'Zone', cell: row => <span className="font-bold text-slate-800">{row.zone}</span> },
                { header: 'Growth', cell: row => `${row.growthRate}%` },
                { header: 'New buildings', cell: row => row.newBuildings.toLocaleString() },
                { header: 'Population Δ', cell: row => `+${row.populationChange.toLocaleString()}` },
                { header: 'Type', cell: row => row.developmentType },
              ]}
            />
          </Panel>

          <Panel title="Development Hotspots" icon={<TrendingUp className="w-5 h-5" />}>
            <DataTable
              rows={data.hotspots}
              rowKey={row => row.area}
              columns={[
                { header: 'Area', cell: row => <span className="font-bold text-slate-800">{row.area}</span> },
                { header: 'Intensity', cell: row => row.intensity },
                { header: 'Driver', cell: row => row.driver },
                { header: 'Infrastructure', cell: row => row.infrastructureReadiness },
                { header: 'Impact', cell: row => row.environmentalImpact },
              ]}
            />
          </Panel>
        </div>

        <div className="space-y-8">
          <GuidancePanel guidance={data.guidance} audience={audience} />

          <Panel title="Land Cover Change" icon={<Layers className="w-5 h-5" />} action={<span className="text-[10px] text-slate-400">Simulated Landsat</span>}>
            <div className="space-y-3">
              {changeRates.map(rate => (
                <div key={rate.label} className="flex justify-between text-sm">
                  <span className="text-slate-600">{rate.label}</span>
                  <span className={`font-bold ${rate.value < 0 ? 'text-red-600' : 'text-orange-600'}`}>
                    {rate.value > 0 ? '+' : ''}{rate.value}%
                  </span>
                </div>
              ))}
            </div>
            <p className="text-xs text-slate-400 mt-4">
              {landCover.dominantChange} across {landCover.totalAreaKm2} km²
            </p>
          </Panel>

          <Panel title="Land Use Transitions" icon={<Layers className="w-5 h-5" />}>
            <div className="space-y-3">
              {data.landUse.map(change => (
                <div key={change.originalUse} className="p-3 rounded-2xl bg-slate-50 border border-slate-100">
                  <div className="flex justify-between">
                    <p className="font-bold text-sm text-slate-800">{change.originalUse}</p>
                    <span className="text-[10px] font-bold uppercase text-slate-500">{change.impactLevel}</span>
                  </div>
                  <p className="text-[10px] text-slate-400 mt-1">{change.currentUse} · {change.areaLost} km² lost</p>
                </div>
              ))}
            </div>
          </Panel>
        </div>
      </div>
    </div>
  );
}
