import { Flame, Map as MapIcon, Snowflake, Sun, Thermometer, TrendingUp, Users } from 'lucide-react';
import { CircleMarker, Tooltip as MapTooltip } from 'react-leaflet';
import { Area, AreaChart, CartesianGrid, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts';
import { fetchHeat, useApi } from '../lib/api';
import type { CityInfo, PriorityLevel, StakeholderId } from '../types';
import { CityMap } from './CityMap';
import { GuidancePanel } from './GuidancePanel';
import { DataTable, ErrorState, LoadingState, Panel } from './Panel';
import { SourceBadge } from './SourceBadge';

/** Blue below 28 °C through red above 38 °C. */
const temperatureColor = (t: number) => {
  if (t < 28) return '#3b82f6';
  if (t < 32) return '#10b981';
  if (t < 35) return '#eab308';
  if (t < 38) return '#f97316';
  return '#ef4444';
};

const PRIORITY_STYLES: Record<PriorityLevel, string> = {
  Critical: 'bg-red-100 text-red-700',
  High: 'bg-orange-100 text-orange-700',
  Medium: 'bg-yellow-100 text-yellow-700',
  Low: 'bg-emerald-100 text-emerald-700',
};

export function HeatView({ stakeholder, audience, city }: { stakeholder: StakeholderId; audience: string; city: CityInfo }) {
  const { data, error, loading, reload } = useApi(signal => fetchHeat(stakeholder, signal), [stakeholder]);

  if (loading) return <LoadingState />;
  if (error || !data) return <ErrorState message={error ?? 'No data'} onRetry={reload} />;

  const current = data.current.data;

  return (
    <div className="grid grid-cols-1 lg:grid-cols-3 gap-8">
      <div className="lg:col-span-2 space-y-8">
        <Panel title="Land Surface Temperature" icon={<MapIcon className="w-5 h-5" />} action={<span className="text-[10px] text-slate-400">Simulated MODIS LST</span>}>
          <CityMap city={city}>
            {data.grid.map((point, i) => (
              <CircleMarker
                key={i}
                center={[point.latitude, point.longitude]}
                radius={6}
                pathOptions={{ color: temperatureColor(point.temperature), fillColor: temperatureColor(point.temperature), fillOpacity: 0.7, weight: 1 }}
              >
                <MapTooltip>{point.temperature}°C · {point.areaType.replace('_', ' ')}</MapTooltip>
              </CircleMarker>
            ))}
          </CityMap>
        </Panel>

        <Panel title="7-Day Temperature Trend" icon={<TrendingUp className="w-5 h-5" />} action={<SourceBadge value={data.trend} />}>
          <div className="h-[260px] w-full">
            <ResponsiveContainer width="100%" height="100%">
              <AreaChart data={data.trend.data}>
                <defs>
                  <linearGradient id="colorMax" x1="0" y1="0" x2="0" y2="1">
                    <stop offset="5%" stopColor="#f97316" stopOpacity={0.15} />
                    <stop offset="95%" stopColor="#f97316" stopOpacity={0} />
                  </linearGradient>
                </defs>
                <CartesianGrid strokeDasharray="3 3" vertical={false} stroke="#f1f5f9" />
                <XAxis dataKey="date" tick={{ fontSize: 10, fill: '#94a3b8' }} axisLine={false} tickLine={false} />
                <YAxis axisLine={false} tickLine={false} tick={{ fontSize: 10, fill: '#94a3b8' }} unit="°" />
                <Tooltip contentStyle={{ borderRadius: '16px', border: 'none', boxShadow: '0 10px 15px -3px rgb(0 0 0 / 0.1)' }} />
                <Area type="monotone" dataKey="max" stroke="#f97316" strokeWidth={3} fill="url(#colorMax)" />
                <Area type="monotone" dataKey="average" stroke="#eab308" strokeWidth={2} fill="transparent" />
                <Area type="monotone" dataKey="min" stroke="#3b82f6" strokeWidth={2} fill="transparent" />
              </AreaChart>
            </ResponsiveContainer>
          </div>
        </Panel>

        <Panel title="Ward Heat Vulnerability" icon={<Users className="w-5 h-5" />}>
          <DataTable
            rows={data.vulnerability}
            rowKey={row => row.ward}
            columns={[
              { header: 'Ward', cell: row => <span className="font-bold text-slate-800">{row.ward}</span> },
              { header: 'Avg temp', cell: row => `${row.averageTemperature}°C` },
              { header: 'Population', cell: row => row.population.toLocaleString() },
              { header: 'Green cover', cell: row => `${row.greenCover}%` },
              { header: 'Index', cell: row => row.index.toFixed(2) },
              {
                header: 'Priority',
                cell: row => <span className={`px-2 py-1 rounded-full text-[10px] font-bold ${PRIORITY_STYLES[row.priority]}`}>{row.priority}</span>,
              },
            ]}
          />
        </Panel>
      </div>

      <div className="space-y-8">
        <Panel title="Right Now" icon={<Thermometer className="w-5 h-5" />} action={<SourceBadge value={data.current} />}>
          <div className="grid grid-cols-2 gap-4">
            <div className="p-4 rounded-2xl bg-orange-50 border border-orange-100">
              <p className="text-[10px] font-bold text-orange-400 uppercase tracking-wider">Temperature</p>
              <p className="text-xl font-bold text-orange-900">{current.temperature}°C</p>
            </div>
            <div className="p-4 rounded-2xl bg-red-50 border border-red-100">
              <p className="text-[10px] font-bold text-red-400 uppercase tracking-wider">Heat index</p>
              <p className="text-xl font-bold text-red-900">{current.heatIndex}°C</p>
            </div>
            <div className="p-4 rounded-2xl bg-blue-50 border border-blue-100">
              <p className="text-[10px] font-bold text-blue-400 uppercase tracking-wider">Humidity</p>
              <p className="text-xl font-bold text-blue-900">{current.humidity}%</p>
            </div>
            <div className="p-4 rounded-2xl bg-yellow-50 border border-yellow-100">
              <p className="text-[10px] font-bold text-yellow-500 uppercase tracking-wider flex items-center gap-1"><Sun className="w-3 h-3" /> UV</p>
              <p className="text-xl font-bold text-yellow-900">{data.uv.data.uvIndex} <span className="text-xs font-medium">{data.uv.data.riskLevel}</span></p>
            </div>
          </div>
        </Panel>

        <GuidancePanel guidance={data.guidance} audience={audience} />

        <Panel title="Zone Temperatures" icon={<Flame className="w-5 h-5" />}>
          <div className="space-y-3">
            {data.zones.map(zone => (
              <div key={zone.zone} className="flex justify-between items-center p-3 rounded-2xl bg-slate-50 border border-slate-100">
                <div>
                  <p className="font-bold text-sm text-slate-800">{zone.zone}</p>
                  <p className="text-[10px] text-slate-400">Max {zone.dailyMax}°C · {zone.heatIndexLabel}</p>
                </div>
                <span className="text-lg font-black" style={{ color: temperatureColor(zone.current) }}>{zone.current}°</span>
              </div>
            ))}
          </div>
        </Panel>

        <Panel title="Heat Islands" icon={<Snowflake className="w-5 h-5" />}>
          <p className="text-sm text-slate-600">
            Urban areas run <strong>{data.islands.intensity}°C</strong> warmer than surrounding land
            (surface {data.islands.surfaceIntensity}°C, canopy {data.islands.canopyIntensity}°C).
          </p>
          <ul className="mt-4 space-y-2 text-xs">
            {data.islands.hotspots.map(spot => (
              <li key={spot.name} className="flex justify-between text-red-700"><span>{spot.name}</span><span>+{spot.intensity}°C</span></li>
            ))}
            {data.islands.coolingZones.map(zone => (
              <li key={zone.name} className="flex justify-between text-emerald-700"><span>{zone.name}</span><span>{zone.cooling}°C</span></li>
            ))}
          </ul>
        </Panel>
      </div>
    </div>
  );
}
