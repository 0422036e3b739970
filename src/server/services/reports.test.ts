import { beforeEach, afterEach, describe, expect, it } from 'vitest';
import type { Db } from '../db';
import { createTestDb, TEST_NOW } from '../testUtils';
import {
  getReport,
  getReportAnalytics,
  getReportProgress,
  InvalidTransitionError,
  listReports,
  NewReportSchema,
  nextReferenceId,
  ReportNotFoundError,
  submitReport,
  trackReport,
  updateReportStatus,
} from './reports';

const LATER = new Date('2026-06-15T13:00:00.000Z');

describe('community reports', () => {
  let db: Db;

  beforeEach(() => {
    db = createTestDb().db;
  });

  afterEach(() => {
    db.close();
  });

  describe('seeding', () => {
    it('numbers sample reports in submission order', () => {
      const all = listReports(db, { period: 'all' }, TEST_NOW);
      expect(all.map(r => [r.referenceId, r.type])).toEqual([
        ['CR-2026-0006', 'Air Pollution'],
        ['CR-2026-0005', 'Noise Pollution'],
        ['CR-2026-0004', 'Water Pollution'],
        ['CR-2026-0003', 'Flooding'],
        ['CR-2026-0002', 'Waste Management'],
        ['CR-2026-0001', 'Tree/Green Space'],
      ]);
      expect(getReport(db, 'CR-2026-0006').createdAt).toBe('2026-06-15T09:00:00.000Z');
    });
  });

  describe('nextReferenceId', () => {
    it('continues the current year and restarts for a new one', () => {
      expect(nextReferenceId(db, 2026)).toBe('CR-2026-0007');
      expect(nextReferenceId(db, 2027)).toBe('CR-2027-0001');
    });
  });

  describe('submitReport', () => {
    it('stores an open report with the next reference id', () => {
      const input = NewReportSchema.parse({
        type: 'Flooding',
        severity: 'High',
        description: '  Storm drain blocked near the bus stop  ',
        latitude: 12.93,
        longitude: 77.62,
        contact: 'resident@example.test',
      });
      const report = submitReport(db, input, TEST_NOW);

      expect(report).toEqual({
        referenceId: 'CR-2026-0007',
        type: 'Flooding',
        severity: 'High',
        status: 'Open',
        description: 'Storm drain blocked near the bus stop',
        latitude: 12.93,
        longitude: 77.62,
        address: null,
        contact: 'resident@example.test',
        anonymous: false,
        assignedTo: null,
        createdAt: TEST_NOW.toISOString(),
        updatedAt: TEST_NOW.toISOString(),
      });
    });

    it('drops contact details from anonymous reports', () => {
      const input = NewReportSchema.parse({
        type: 'Noise Pollution',
        severity: 'Low',
        description: 'Loudspeakers after midnight',
        latitude: 12.97,
        longitude: 77.59,
        contact: 'resident@example.test',
        anonymous: true,
      });
      expect(submitReport(db, input, TEST_NOW)).toMatchObject({ anonymous: true, contact: null });
    });
  });

  describe('NewReportSchema', () => {
    const valid = { type: 'Other', severity: 'Low', description: 'Something worth checking', latitude: 12.97, longitude: 77.59 };

    it('defaults anonymous to false', () => {
      expect(NewReportSchema.parse(valid).anonymous).toBe(false);
    });

    it('rejects locations outside the city', () => {
      const result = NewReportSchema.safeParse({ ...valid, latitude: 13.5 });
      expect(result.success).toBe(false);
      expect(result.error?.issues[0]?.message).toBe('Location is outside the city');
    });

    it('requires a meaningful description', () => {
      expect(NewReportSchema.safeParse({ ...valid, description: '   short   ' }).success).toBe(false);
    });

    it('rejects unknown types', () => {
      expect(NewReportSchema.safeParse({ ...valid, type: 'Potholes' }).success).toBe(false);
    });
  });

  describe('listReports', () => {
    it('filters by period', () => {
      expect(listReports(db, { period: '24h' }, TEST_NOW).map(r => r.referenceId)).toEqual(['CR-2026-0006', 'CR-2026-0005']);
      expect(listReports(db, { period: '7d' }, TEST_NOW)).toHaveLength(5);
      expect(listReports(db, { period: '30d' }, TEST_NOW)).toHaveLength(6);
    });

    it('combines filters', () => {
      expect(listReports(db, { status: 'Open', period: 'all' }, TEST_NOW).map(r => r.referenceId))
        .toEqual(['CR-2026-0006', 'CR-2026-0005', 'CR-2026-0001']);
      expect(listReports(db, { severity: 'Critical', type: 'Flooding', period: 'all' }, TEST_NOW).map(r => r.referenceId))
        .toEqual(['CR-2026-0003']);
      expect(listReports(db, { type: 'Infrastructure', period: 'all' }, TEST_NOW)).toEqual([]);
    });
  });

  describe('progress', () => {
    it('maps statuses onto the tracking steps', () => {
      expect(getReportProgress('Open')).toEqual({
        steps: ['Submitted', 'Acknowledged', 'Assigned', 'In Progress', 'Resolved'],
        currentStep: 0,
        complete: false,
      });
      expect(getReportProgress('In Progress')).toMatchObject({ currentStep: 3, complete: false });
      expect(getReportProgress('Resolved')).toMatchObject({ currentStep: 4, complete: true });
      expect(getReportProgress('Closed')).toMatchObject({ currentStep: 4, complete: true });
    });

    it('tracks a stored report', () => {
      expect(trackReport(db, 'CR-2026-0002').progress).toMatchObject({ currentStep: 4, complete: true });
    });

    it('throws for an unknown reference', () => {
      expect(() => trackReport(db, 'CR-2026-9999')).toThrow(ReportNotFoundError);
      expect(() => trackReport(db, 'CR-2026-9999')).toThrow('Report CR-2026-9999 not found');
    });
  });

  describe('updateReportStatus', () => {
    it('moves a report forward and records the assignee', () => {
      const report = updateReportStatus(db, 'CR-2026-0001', { status: 'Assigned', assignedTo: 'Parks Department' }, LATER);
      expect(report).toMatchObject({ status: 'Assigned', assignedTo: 'Parks Department', updatedAt: LATER.toISOString() });

      const progressed = updateReportStatus(db, 'CR-2026-0001', { status: 'In Progress' }, LATER);
      expect(progressed.assignedTo).toBe('Parks Department');
    });

    it('refuses to move backwards or stand still', () => {
      expect(() => updateReportStatus(db, 'CR-2026-0003', { status: 'Acknowledged' }, LATER))
        .toThrow(new InvalidTransitionError('In Progress', 'Acknowledged'));
      expect(() => updateReportStatus(db, 'CR-2026-0003', { status: 'In Progress' }, LATER)).toThrow(InvalidTransitionError);
      expect(getReport(db, 'CR-2026-0003').status).toBe('In Progress');
    });

    it('throws for an unknown reference', () => {
      expect(() => updateReportStatus(db, 'CR-2026-0042', { status: 'Closed' }, LATER)).toThrow(ReportNotFoundError);
    });
  });

  describe('getReportAnalytics', () => {
    it('summarizes the seeded reports', () => {
      expect(getReportAnalytics(db)).toEqual({
        total: 6,
        open: 5,
        byType: {
          'Tree/Green Space': 1,
          'Waste Management': 1,
          Flooding: 1,
          'Water Pollution': 1,
          'Noise Pollution': 1,
          'Air Pollution': 1,
        },
        byStatus: { Open: 3, Resolved: 1, 'In Progress': 2 },
        resolutionRate: 16.7,
        averageSeverity: 3,
      });
    });

    it('counts closed reports as resolved', () => {
      updateReportStatus(db, 'CR-2026-0003', { status: 'Closed' }, LATER);
      expect(getReportAnalytics(db)).toMatchObject({ open: 4, resolutionRate: 33.3 });
    });
  });
});
