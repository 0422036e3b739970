import express, { type ErrorRequestHandler, type Request, type Response } from 'express';
import { z } from 'zod';
import { MODULE_IDS, STAKEHOLDER_IDS } from '../lib/catalog';
import type { Rng } from '../lib/random';
import type { StakeholderId } from '../types';
import type { AppConfig } from './config';
import type { CityData, GuidanceTable } from './data/cityData';
import type { Db } from './db';
import type { FetchFn, SleepFn } from './http';
import { getAirQualityDashboard } from './services/airQuality';
import { answerChat, ChatRequestError, explainDataPoint, getDailySummary, type AssistantDeps, type ChatModel } from './services/chat';
import { getStakeholderGuidance } from './services/guidance';
import { getHeatDashboard } from './services/heat';
import { getOverviewDashboard } from './services/overview';
import {
  getReportAnalytics,
  InvalidTransitionError,
  listReports,
  NewReportSchema,
  ReportFiltersSchema,
  ReportNotFoundError,
  StatusUpdateSchema,
  submitReport,
  trackReport,
  updateReportStatus,
} from './services/reports';
import { getUrbanGrowthDashboard } from './services/urbanGrowth';
import { getWaterDashboard } from './services/water';
import { WeatherService } from './services/weather';

export interface AppDeps {
  db: Db;
  config: AppConfig;
  city: CityData;
  guidance: GuidanceTable;
  fetchFn?: FetchFn;
  sleepFn?: SleepFn;
  rng?: Rng;
  chatModel?: ChatModel | null;
  now?: () => Date;
}

const StakeholderQuerySchema = z.object({ stakeholder: z.enum(STAKEHOLDER_IDS).default('citizens') });

const GuidanceParamsSchema = z.object({ module: z.enum(MODULE_IDS) });

const ChatRequestSchema = z.object({
  messages: z.array(z.object({
    role: z.enum(['user', 'assistant']),
    content: z.string().trim().min(1).max(4000),
  })).min(1).max(50),
  stakeholder: z.enum(STAKEHOLDER_IDS).optional(),
});

const ExplainRequestSchema = z.object({
  dataType: z.string().trim().min(1).max(100),
  value: z.union([z.number(), z.string().max(100)]),
  context: z.string().max(1000).optional(),
});

const invalidRequest = (res: Response, error: z.ZodError) =>
  res.status(400).json({ error: 'Invalid request', details: error.issues });

/** Status of a body-parser failure (malformed JSON, body too large, bad charset), if `err` is one. */
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null || !('status' in err)) return null;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

/** Request errors raised before a route keep their 4xx status; anything else that escapes a route is a 500. */
const handleError: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: 'Invalid JSON body' });
    return;
  }
  const status = clientErrorStatus(err);
  if (status !== null) {
    res.status(status).json({ error: err instanceof Error ? err.message : 'Invalid request' });
    return;
  }
  console.error('Unhandled request error:', err);
  res.status(500).json({ error: 'Internal server error' });
};

/**
 * Parse `?stakeholder=`, answering 400 for unknown ids.
 * Returns null when the response has already been sent.
 */
function stakeholderOf(req: Request, res: Response): StakeholderId | null {
  const parsed = StakeholderQuerySchema.safeParse(req.query);
  if (!parsed.success) {
    invalidRequest(res, parsed.error);
    return null;
  }
  return parsed.data.stakeholder;
}

/** Build the JSON API. Everything with side effects outside the process is injected. */
export function createApp(deps: AppDeps) {
  const { db, config, city, guidance } = deps;
  const rng = deps.rng ?? Math.random;
  const now = deps.now ?? (() => new Date());
  const weather = new WeatherService({ db, config, city, fetchFn: deps.fetchFn, sleepFn: deps.sleepFn, rng, now });
  const assistant: AssistantDeps = { db, weather, city, cityInfo: config.city, model: deps.chatModel ?? null };

  const app = express();
  app.use(express.json({ limit: '100kb' }));

  // ---------------------------------------------------------------------------
  // API ROUTES: JSON endpoints consumed by the React frontend.
  // ---------------------------------------------------------------------------

  /** GET /api/health: Liveness probe. */
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', assistant: assistant.model ? 'configured' : 'unavailable' });
  });

  /** GET /api/city: The monitored city. */
  app.get('/api/city', (_req, res) => {
    res.json(config.city);
  });

  /** GET /api/overview: Headline metrics, alerts and map locations. */
  app.get('/api/overview', async (req, res) => {
    const stakeholder = stakeholderOf(req, res);
    if (!stakeholder) return;
    try {
      res.json(await getOverviewDashboard({ db, weather, city, cityInfo: config.city, guidance, now }, stakeholder));
    } catch (err) {
      console.error('GET /api/overview error:', err);
      res.status(500).json({ error: 'Failed to load overview' });
    }
  });

  /** GET /api/heat: Heat-island grid, zone temperatures and ward vulnerability. */
  app.get('/api/heat', async (req, res) => {
    const stakeholder = stakeholderOf(req, res);
    if (!stakeholder) return;
    try {
      res.json(await getHeatDashboard({ weather, city, guidance, rng }, stakeholder));
    } catch (err) {
      console.error('GET /api/heat error:', err);
      res.status(500).json({ error: 'Failed to load heat data' });
    }
  });

  /** GET /api/water: Lake health, flood risk and quality trends. */
  app.get('/api/water', (req, res) => {
    const stakeholder = stakeholderOf(req, res);
    if (!stakeholder) return;
    try {
      res.json(getWaterDashboard({ db, city, cityName: config.city.name, guidance, rng, now }, stakeholder));
    } catch (err) {
      console.error('GET /api/water error:', err);
      res.status(500).json({ error: 'Failed to load water data' });
    }
  });

  /** GET /api/air-quality: Current and hourly air quality, stations and hotspots. */
  app.get('/api/air-quality', async (req, res) => {
    const stakeholder = stakeholderOf(req, res);
    if (!stakeholder) return;
    try {
      res.json(await getAirQualityDashboard({ db, weather, city, guidance, rng }, stakeholder));
    } catch (err) {
      console.error('GET /api/air-quality error:', err);
      res.status(500).json({ error: 'Failed to load air quality data' });
    }
  });

  /** GET /api/urban-growth: Development zones, land use and infrastructure strain. */
  app.get('/api/urban-growth', (req, res) => {
    const stakeholder = stakeholderOf(req, res);
    if (!stakeholder) return;
    try {
      res.json(getUrbanGrowthDashboard(city, guidance, stakeholder));
    } catch (err) {
      console.error('GET /api/urban-growth error:', err);
      res.status(500).json({ error: 'Failed to load urban growth data' });
    }
  });

  /** GET /api/guidance/:module: Stakeholder recommendations for modules without a dashboard payload. */
  app.get('/api/guidance/:module', (req, res) => {
    const params = GuidanceParamsSchema.safeParse(req.params);
    if (!params.success) return invalidRequest(res, params.error);
    const stakeholder = stakeholderOf(req, res);
    if (!stakeholder) return;
    res.json(getStakeholderGuidance(guidance, params.data.module, stakeholder));
  });

  /** GET /api/reports: Community reports, newest first. */
  app.get('/api/reports', (req, res) => {
    const filters = ReportFiltersSchema.safeParse(req.query);
    if (!filters.success) return invalidRequest(res, filters.error);
    try {
      res.json(listReports(db, filters.data, now()));
    } catch (err) {
      console.error('GET /api/reports error:', err);
      res.status(500).json({ error: 'Failed to load reports' });
    }
  });

  /** POST /api/reports: Submit a community report. */
  app.post('/api/reports', (req, res) => {
    const body = NewReportSchema.safeParse(req.body);
    if (!body.success) return invalidRequest(res, body.error);
    try {
      res.status(201).json(submitReport(db, body.data, now()));
    } catch (err) {
      console.error('POST /api/reports error:', err);
      res.status(500).json({ error: 'Failed to save report' });
    }
  });

  /** GET /api/reports/analytics: Totals, breakdowns and resolution rate. */
  app.get('/api/reports/analytics', (_req, res) => {
    try {
      res.json(getReportAnalytics(db));
    } catch (err) {
      console.error('GET /api/reports/analytics error:', err);
      res.status(500).json({ error: 'Failed to load report analytics' });
    }
  });

  /** GET /api/reports/:referenceId: One report with its progress. */
  app.get('/api/reports/:referenceId', (req, res) => {
    try {
      res.json(trackReport(db, req.params.referenceId));
    } catch (err) {
      if (err instanceof ReportNotFoundError) return res.status(404).json({ error: err.message });
      console.error(`GET /api/reports/${req.params.referenceId} error:`, err);
      res.status(500).json({ error: 'Failed to load report' });
    }
  });

  /** PATCH /api/reports/:referenceId: Move a report forward in its lifecycle. */
  app.patch('/api/reports/:referenceId', (req, res) => {
    const body = StatusUpdateSchema.safeParse(req.body);
    if (!body.success) return invalidRequest(res, body.error);
    try {
      res.json(updateReportStatus(db, req.params.referenceId, body.data, now()));
    } catch (err) {
      if (err instanceof ReportNotFoundError) return res.status(404).json({ error: err.message });
      if (err instanceof InvalidTransitionError) return res.status(409).json({ error: err.message });
      console.error(`PATCH /api/reports/${req.params.referenceId} error:`, err);
      res.status(500).json({ error: 'Failed to update report' });
    }
  });

  /** POST /api/chat: Answer the latest user message with live context. */
  app.post('/api/chat', async (req, res) => {
    const body = ChatRequestSchema.safeParse(req.body);
    if (!body.success) return invalidRequest(res, body.error);
    try {
      res.json(await answerChat(assistant, body.data.messages, body.data.stakeholder));
    } catch (err) {
      if (err instanceof ChatRequestError) return res.status(400).json({ error: err.message });
      console.error('POST /api/chat error:', err);
      res.status(502).json({ error: 'The assistant could not generate a response' });
    }
  });

  /** GET /api/insights/daily-summary: Short written summary of today's readings. */
  app.get('/api/insights/daily-summary', async (_req, res) => {
    try {
      res.json(await getDailySummary(assistant));
    } catch (err) {
      console.error('GET /api/insights/daily-summary error:', err);
      res.status(502).json({ error: 'Failed to generate daily summary' });
    }
  });

  /** POST /api/insights/explain: Plain-language explanation of one data point. */
  app.post('/api/insights/explain', async (req, res) => {
    const body = ExplainRequestSchema.safeParse(req.body);
    if (!body.success) return invalidRequest(res, body.error);
    try {
      res.json(await explainDataPoint(assistant, body.data));
    } catch (err) {
      console.error('POST /api/insights/explain error:', err);
      res.status(502).json({ error: 'Failed to explain data point' });
    }
  });

  app.use('/api', (_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use(handleError);

  return app;
}
