import type { ReactNode } from 'react';
import { MapContainer, TileLayer } from 'react-leaflet';
import { MAP_ZOOM } from '../constants';
import type { CityInfo } from '../types';

/** OpenStreetMap base layer centred on the city; layers go in as children. */
export function CityMap({ city, children, height = 'h-[360px]' }: { city: CityInfo; children: ReactNode; height?: string }) {
  return (
    <div className={`${height} w-full rounded-2xl overflow-hidden border border-slate-100`}>
      <MapContainer center={[city.latitude, city.longitude]} zoom={MAP_ZOOM} scrollWheelZoom={false} className="z-10 h-full w-full">
        <TileLayer
          url="https://{s}.tile.openstreetmap.org/{z}/{x}/{y}.png"
          maxZoom={19}
          attribution='&copy; <a href="https://www.openstreetmap.org/copyright">OpenStreetMap</a> contributors'
        />
        {children}
      </MapContainer>
    </div>
  );
}
