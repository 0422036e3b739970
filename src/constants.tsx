import type { ReactNode } from 'react';
import { Bot, Building2, Droplets, LayoutDashboard, Megaphone, Thermometer, Wind } from 'lucide-react';
import type { ModuleId } from './types';

export interface ModuleEntry {
  id: ModuleId;
  label: string;
  icon: ReactNode;
  blurb: string;
}

/** Top navigation, in display order. */
export const MODULES: ModuleEntry[] = [
  { id: 'overview', label: 'Overview', icon: <LayoutDashboard className="w-4 h-4" />, blurb: 'City-wide indicators, alerts and data sources' },
  { id: 'heat', label: 'Heat Islands', icon: <Thermometer className="w-4 h-4" />, blurb: 'Surface temperature, trends and ward vulnerability' },
  { id: 'water', label: 'Water', icon: <Droplets className="w-4 h-4" />, blurb: 'Lake health, flood risk and quality trends' },
  { id: 'air', label: 'Air Quality', icon: <Wind className="w-4 h-4" />, blurb: 'Live AQI, stations and NO₂ hotspots' },
  { id: 'growth', label: 'Urban Growth', icon: <Building2 className="w-4 h-4" />, blurb: 'Development zones, land use and infrastructure strain' },
  { id: 'reports', label: 'Community', icon: <Megaphone className="w-4 h-4" />, blurb: 'Citizen reports and their progress' },
  { id: 'assistant', label: 'Assistant', icon: <Bot className="w-4 h-4" />, blurb: 'Ask about current conditions' },
];

/** Zoom level shared by every module map. */
export const MAP_ZOOM = 11;

export const SAMPLE_QUESTIONS = [
  "What's the air quality like today?",
  'Which areas are hottest right now?',
  'How healthy is Bellandur Lake?',
  'What should I do during a heat wave?',
];

/** Named colours used by the API mapped to hex for map layers. */
export const MAP_COLORS: Record<string, string> = {
  red: '#ef4444',
  darkred: '#991b1b',
  orange: '#f97316',
  yellow: '#eab308',
  green: '#10b981',
  blue: '#3b82f6',
  purple: '#9333ea',
  gold: '#ca8a04',
};

export const mapColor = (name: string) => MAP_COLORS[name] ?? '#64748b';
