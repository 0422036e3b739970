import { stakeholderLabel } from '../../lib/catalog';
import type { Guidance, ModuleId, StakeholderId } from '../../types';
import type { GuidanceTable } from '../data/cityData';

const MODULE_NAMES: Record<ModuleId, string> = {
  overview: 'the city overview',
  heat: 'heat islands',
  water: 'water monitoring',
  air: 'air quality',
  growth: 'urban growth',
  reports: 'community reports',
  assistant: 'the assistant',
};

/** Stakeholder-specific focus and actions for a module; stakeholders without an entry get a generic focus. */
export function getStakeholderGuidance(table: GuidanceTable, module: ModuleId, stakeholder: StakeholderId): Guidance {
  const entry = table[module]?.[stakeholder];
  if (entry) return { focus: entry.focus, actions: [...entry.actions] };
  return {
    focus: `General view of ${MODULE_NAMES[module]} for ${stakeholderLabel(stakeholder)}.`,
    actions: [],
  };
}
