import { AlertTriangle, Droplets, Leaf, MapPin, ShieldAlert, Thermometer, Wind } from 'lucide-react';
import { CircleMarker, Popup } from 'react-leaflet';
import { getAqiColor, getAqiStatus } from '../lib/aqi';
import { fetchOverview, useApi } from '../lib/api';
import { mapColor } from '../constants';
import type { CityInfo, StakeholderId } from '../types';
import { CityMap } from './CityMap';
import { GuidancePanel } from './GuidancePanel';
import { MetricCard } from './MetricCard';
import { ErrorState, LoadingState, Panel } from './Panel';
import { SourceBadge } from './SourceBadge';

const TILE_ICONS = [
  <Thermometer className="w-4 h-4" />,
  <Droplets className="w-4 h-4" />,
  <Wind className="w-4 h-4" />,
  <Leaf className="w-4 h-4" />,
];

const SEVERITY_STYLES = {
  High: 'bg-red-50 border-red-100 text-red-700',
  Moderate: 'bg-amber-50 border-amber-100 text-amber-700',
  Low: 'bg-slate-50 border-slate-100 text-slate-600',
} as const;

export function OverviewView({ stakeholder, audience, city }: { stakeholder: StakeholderId; audience: string; city: CityInfo }) {
  const { data, error, loading, reload } = useApi(signal => fetchOverview(stakeholder, signal), [stakeholder]);

  if (loading) return <LoadingState />;
  if (error || !data) return <ErrorState message={error ?? 'No data'} onRetry={reload} />;

  const aq = data.airQuality.data;
  const status = getAqiStatus(aq.aqi);

  return (
    <div className="space-y-8">
      <div className="flex flex-col sm:flex-row justify-between items-start gap-4">
        <div>
          <h2 className="text-2xl md:text-4xl font-black text-slate-800 tracking-tight">{data.city.name}</h2>
          <div className="flex flex-wrap items-center gap-2 mt-2">
            <SourceBadge value={data.weather} />
            <SourceBadge value={data.airQuality} />
          </div>
        </div>
        <div className="bg-slate-50 px-4 py-2 rounded-2xl text-[10px] font-mono text-slate-400 border border-slate-100">
          {data.city.latitude.toFixed(4)}°N, {data.city.longitude.toFixed(4)}°E
        </div>
      </div>

      <div className="grid grid-cols-1 sm:grid-cols-2 lg:grid-cols-4 gap-4">
        {data.metrics.map((tile, i) => <MetricCard key={tile.label} tile={tile} icon={TILE_ICONS[i]} explainable />)}
      </div>

      {data.validation.warnings.length + data.validation.errors.length > 0 && (
        <div className="p-4 rounded-2xl bg-amber-50 border border-amber-100 text-xs text-amber-800 space-y-1">
          {[...data.validation.errors, ...data.validation.warnings].map(message => <p key={message}>{message}</p>)}
        </div>
      )}

      <div className="grid grid-cols-1 lg:grid-cols-3 gap-8">
        <div className="lg:col-span-2 space-y-8">
          <Panel title="Environmental Monitoring" icon={<MapPin className="w-5 h-5" />}>
            <CityMap city={city}>
              {data.locations.map(location => (
                <CircleMarker
                  key={location.name}
                  center={[location.latitude, location.longitude]}
                  radius={10}
                  pathOptions={{ color: mapColor(location.color), fillColor: mapColor(location.color), fillOpacity: 0.6 }}
                >
                  <Popup>
                    <p className="font-bold">{location.name}</p>
                    <p className="text-xs">{location.type}</p>
                  </Popup>
                </CircleMarker>
              ))}
            </CityMap>
          </Panel>

          <Panel title="Air Quality Now" icon={<Wind className="w-5 h-5" />}>
            <div className="flex flex-col md:flex-row items-center gap-8">
              <div className="text-center shrink-0">
                <span className={`text-6xl font-black ${getAqiColor(aq.aqi)}`}>{aq.aqi}</span>
                <p className="text-xs font-bold text-slate-400 uppercase tracking-widest mt-1">AQI</p>
              </div>
              <div className="flex-1 p-5 rounded-3xl bg-slate-50 border border-slate-100 flex items-start gap-4">
                <div className={`p-3 rounded-2xl ${status.color} text-white shrink-0`}>
                  <ShieldAlert className="w-5 h-5" />
                </div>
                <div>
                  <h4 className="font-bold text-slate-800">{status.label}</h4>
                  <p className="text-sm text-slate-500 mt-1">{status.desc}</p>
                  <p className="text-xs text-slate-400 mt-2">
                    PM2.5 {aq.pm25} µg/m³ · PM10 {aq.pm10} µg/m³ · dominant {aq.dominantPollutant === 'pm25' ? 'PM2.5' : 'PM10'}
                  </p>
                </div>
              </div>
            </div>
          </Panel>
        </div>

        <div className="space-y-8">
          <GuidancePanel guidance={data.guidance} audience={audience} />

          <Panel title="Recent Alerts" icon={<AlertTriangle className="w-5 h-5" />}>
            <div className="space-y-3">
              {data.alerts.map(alert => (
                <div key={alert.id} className={`p-4 rounded-2xl border ${SEVERITY_STYLES[alert.severity]}`}>
                  <div className="flex justify-between items-center">
                    <p className="font-bold text-sm">{alert.type}</p>
                    <span className="text-[10px] font-bold uppercase tracking-wider">{alert.severity}</span>
                  </div>
                  <p className="text-xs mt-1">
                    {alert.location} · {new Date(alert.createdAt).toLocaleString(undefined, { dateStyle: 'medium', timeStyle: 'short' })}
                  </p>
                </div>
              ))}
            </div>
          </Panel>
        </div>
      </div>

      <footer className="text-[10px] text-slate-400 text-center">
        Data sources: {data.dataSources.join(' · ')} · Updated {new Date(data.lastUpdated).toLocaleTimeString()}
      </footer>
    </div>
  );
}
