import { describe, expect, it } from 'vitest';
import { STAKEHOLDERS } from '../../lib/catalog';
import { loadGuidance } from '../data/cityData';
import { getStakeholderGuidance } from './guidance';

describe('getStakeholderGuidance', () => {
  const table = loadGuidance();

  it('returns the tailored entry for a stakeholder', () => {
    expect(getStakeholderGuidance(table, 'heat', 'parks')).toEqual({
      focus: 'Identify critical areas needing immediate green cover intervention.',
      actions: [
        'Priority areas: CBD, Electronic City and East Zone need immediate intervention',
        'Species selection: use native drought-resistant trees',
        'Maintenance: increase watering frequency for existing green cover',
      ],
    });
  });

  it('falls back to a generic focus without actions', () => {
    expect(getStakeholderGuidance(table, 'air', 'electricity')).toEqual({
      focus: 'General view of air quality for BESCOM (Electricity).',
      actions: [],
    });
  });

  it('covers every stakeholder on the overview', () => {
    for (const { id } of STAKEHOLDERS) {
      expect(getStakeholderGuidance(table, 'overview', id).actions.length).toBeGreaterThan(0);
    }
  });

  it('hands out copies of the action list', () => {
    getStakeholderGuidance(table, 'reports', 'citizens').actions.push('extra');
    expect(getStakeholderGuidance(table, 'reports', 'citizens').actions).toHaveLength(2);
  });
});
