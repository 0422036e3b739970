import { Activity, Factory, MapPin, ShieldAlert } from 'lucide-react';
import { CircleMarker, Popup } from 'react-leaflet';
import { Area, AreaChart, CartesianGrid, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts';
import { getAqiColor, getAqiStatus } from '../lib/aqi';
import { fetchAirQuality, useApi } from '../lib/api';
import type { AqiCategory, CityInfo, StakeholderId } from '../types';
import { CityMap } from './CityMap';
import { GuidancePanel } from './GuidancePanel';
import { ErrorState, LoadingState, Panel } from './Panel';
import { SourceBadge } from './SourceBadge';

const CATEGORY_HEX: Record<AqiCategory, string> = {
  Good: '#10b981',
  Moderate: '#eab308',
  Poor: '#f97316',
  'Very Poor': '#ef4444',
  Severe: '#9333ea',
};

export function AirQualityView({ stakeholder, audience, city }: { stakeholder: StakeholderId; audience: string; city: CityInfo }) {
  const { data, error, loading, reload } = useApi(signal => fetchAirQuality(stakeholder, signal), [stakeholder]);

  if (loading) return <LoadingState />;
  if (error || !data) return <ErrorState message={error ?? 'No data'} onRetry={reload} />;

  const current = data.current.data;
  const status = getAqiStatus(current.aqi);
  const pollutants = [
    { label: 'PM2.5', value: current.pm25, unit: 'µg/m³' },
    { label: 'PM10', value: current.pm10, unit: 'µg/m³' },
    { label: 'NO₂', value: current.no2, unit: 'µg/m³' },
    { label: 'SO₂', value: current.so2, unit: 'µg/m³' },
    { label: 'O₃', value: current.o3, unit: 'µg/m³' },
    { label: 'CO', value: current.co, unit: 'mg/m³' },
  ];
  const hourly = data.hourly.data.map(point => ({
    ...point,
    hour: new Date(point.time).toLocaleTimeString(undefined, { hour: '2-digit' }),
  }));

  return (
    <div className="grid grid-cols-1 lg:grid-cols-3 gap-8">
      <div className="lg:col-span-2 space-y-8">
        <Panel title="Current Air Quality" icon={<ShieldAlert className="w-5 h-5" />} action={<SourceBadge value={data.current} />}>
          <div className="flex flex-col md:flex-row items-center gap-8">
            <div className="text-center shrink-0">
              <span className={`text-6xl font-black ${getAqiColor(current.aqi)}`}>{current.aqi}</span>
              <p className="text-xs font-bold text-slate-400 uppercase tracking-widest mt-1">{status.label}</p>
            </div>
            <div className="grid grid-cols-2 sm:grid-cols-3 gap-4 flex-1 w-full">
              {pollutants.map(p => (
                <div key={p.label} className="p-3 rounded-2xl bg-slate-50 border border-slate-100">
                  <p className="text-[10px] font-bold text-slate-400 uppercase tracking-widest">{p.label}</p>
                  <p className="text-lg font-bold text-slate-700">{p.value} <span className="text-[10px] font-normal text-slate-400">{p.unit}</span></p>
                </div>
              ))}
            </div>
          </div>
          <p className="text-sm text-slate-500 mt-6">{status.desc}</p>
        </Panel>

        <Panel title="Next 24 Hours" icon={<Activity className="w-5 h-5" />} action={<SourceBadge value={data.hourly} />}>
          <div className="h-[260px] w-full">
            <ResponsiveContainer width="100%" height="100%">
              <AreaChart data={hourly}>
                <defs>
                  <linearGradient id="colorPm25" x1="0" y1="0" x2="0" y2="1">
                    <stop offset="5%" stopColor="#10b981" stopOpacity={0.1} />
                    <stop offset="95%" stopColor="#10b981" stopOpacity={0} />
                  </linearGradient>
                  <linearGradient id="colorPm10" x1="0" y1="0" x2="0" y2="1">
                    <stop offset="5%" stopColor="#3b82f6" stopOpacity={0.1} />
                    <stop offset="95%" stopColor="#3b82f6" stopOpacity={0} />
                  </linearGradient>
                </defs>
                <CartesianGrid strokeDasharray="3 3" vertical={false} stroke="#f1f5f9" />
                <XAxis dataKey="hour" tick={{ fontSize: 10, fill: '#94a3b8' }} axisLine={false} tickLine={false} />
                <YAxis axisLine={false} tickLine={false} tick={{ fontSize: 10, fill: '#94a3b8' }} />
                <Tooltip contentStyle={{ borderRadius: '16px', border: 'none', boxShadow: '0 10px 15px -3px rgb(0 0 0 / 0.1)' }} />
                <Area type="monotone" dataKey="pm25" name="PM2.5" stroke="#10b981" strokeWidth={3} fillOpacity={1} fill="url(#colorPm25)" />
                <Area type="monotone" dataKey="pm10" name="PM10" stroke="#3b82f6" strokeWidth={3} fillOpacity={1} fill="url(#colorPm10)" />
              </AreaChart>
            </ResponsiveContainer>
          </div>
        </Panel>

        <Panel title="Monitoring Stations" icon={<MapPin className="w-5 h-5" />}>
          <CityMap city={city}>
            {data.stations.map(station => (
              <CircleMarker
                key={station.id}
                center={[station.latitude, station.longitude]}
                radius={12}
                pathOptions={{ color: CATEGORY_HEX[station.category], fillColor: CATEGORY_HEX[station.category], fillOpacity: 0.7 }}
              >
                <Popup>
                  <p className="font-bold">{station.name}</p>
                  <p className="text-xs">AQI {station.aqi} ({station.category}) · {station.stationType}</p>
                  <p className="text-xs">PM2.5 {station.pm25} · PM10 {station.pm10} · NO₂ {station.no2}</p>
                </Popup>
              </CircleMarker>
            ))}
          </CityMap>
        </Panel>
      </div>

      <div className="space-y-8">
        <GuidancePanel guidance={data.guidance} audience={audience} />

        <Panel title="NO₂ Hotspots" icon={<Factory className="w-5 h-5" />} action={<span className="text-[10px] text-slate-400">Simulated TROPOMI</span>}>
          {data.hotspots.length === 0 ? (
            <p className="text-sm text-slate-500">No zone is above its usual range today.</p>
          ) : (
            <div className="space-y-3">
              {data.hotspots.map(spot => (
                <div
                  key={spot.zone}
                  className={`p-4 rounded-2xl border ${spot.severity === 'High' ? 'bg-red-50 border-red-100' : 'bg-amber-50 border-amber-100'}`}
                >
                  <div className="flex justify-between">
                    <p className="font-bold text-sm text-slate-800">{spot.zone}</p>
                    <span className="text-[10px] font-bold uppercase">{spot.severity}</span>
                  </div>
                  <p className="text-[10px] text-slate-500 mt-1">
                    {spot.currentLevel} × 10¹⁵ molec/cm² (75th pct {spot.threshold})
                  </p>
                </div>
              ))}
            </div>
          )}
        </Panel>

        <Panel title="Station Ranking" icon={<Activity className="w-5 h-5" />}>
          <div className="space-y-2">
            {data.stations.map(station => (
              <div key={station.id} className="flex justify-between items-center text-sm">
                <span className="text-slate-600">{station.name}</span>
                <span className={`font-black ${getAqiColor(station.aqi)}`}>{station.aqi}</span>
              </div>
            ))}
          </div>
        </Panel>
      </div>
    </div>
  );
}
