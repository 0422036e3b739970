import { GoogleGenAI } from '@google/genai';
import { getPm25Level } from '../../lib/aqi';
import { stakeholderLabel } from '../../lib/catalog';
import type {
  AirQualityReading,
  ChatMessage,
  ChatResponse,
  CityInfo,
  HeatIslandSummary,
  InsightResponse,
  LakeAssessment,
  StakeholderId,
  WeatherReading,
} from '../../types';
import type { CityData } from '../data/cityData';
import type { Db } from '../db';
import { assessLake, listLakes } from './water';
import type { WeatherService } from './weather';

export const UNAVAILABLE_REPLY = 'The assistant is currently unavailable. Please check API configuration.';
export const UNAVAILABLE_SUMMARY = 'Daily summary is currently unavailable.';
const EMPTY_REPLY = "I'm sorry, I couldn't generate a response at this time.";

const HISTORY_LIMIT = 10;

// ---- Language model --------------------------------------------------------

export interface GenerateRequest {
  systemInstruction?: string;
  messages: ChatMessage[];
  temperature?: number;
  maxOutputTokens?: number;
}

/** Anything that turns a conversation into a reply. */
export interface ChatModel {
  generate(request: GenerateRequest): Promise<string>;
}

export class GeminiChatModel implements ChatModel {
  private readonly ai: GoogleGenAI;
  private readonly model: string;

  constructor(apiKey: string, model: string) {
    this.ai = new GoogleGenAI({ apiKey });
    this.model = model;
  }

  async generate(request: GenerateRequest): Promise<string> {
    const response = await this.ai.models.generateContent({
      model: this.model,
      contents: request.messages.map(message => ({
        role: message.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: message.content }],
      })),
      config: {
        systemInstruction: request.systemInstruction,
        temperature: request.temperature,
        maxOutputTokens: request.maxOutputTokens,
      },
    });
    return response.text ?? '';
  }
}

/** Raised when a chat request has no user message to answer. */
export class ChatRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChatRequestError';
  }
}

// ---- Context ---------------------------------------------------------------

export interface AssistantContext {
  weather?: WeatherReading;
  airQuality?: AirQualityReading;
  heatIslands?: HeatIslandSummary;
  lakes?: LakeAssessment[];
}

const WEATHER_WORDS = ['weather', 'temperature', 'hot', 'cold', 'humid'];
const AIR_WORDS = ['air', 'quality', 'pollution', 'pm2.5', 'pm10'];
const HEAT_WORDS = ['heat', 'island', 'hotspot', 'cooling'];
const LAKE_WORDS = ['lake', 'water'];

const mentions = (query: string, words: readonly string[]) => words.some(word => query.includes(word));

const lakeKeyword = (name: string) => name.toLowerCase().split(' ')[0] ?? name.toLowerCase();

export interface AssistantDeps {
  db: Db;
  weather: WeatherService;
  city: CityData;
  cityInfo: CityInfo;
  model: ChatModel | null;
}

/** Collect the readings a question is about, by keyword. */
export async function gatherContext(deps: AssistantDeps, query: string): Promise<AssistantContext> {
  const q = query.toLowerCase();
  const context: AssistantContext = {};
  const lakes = listLakes(deps.db);

  if (mentions(q, WEATHER_WORDS)) context.weather = (await deps.weather.getCurrentWeather()).data;
  if (mentions(q, AIR_WORDS)) context.airQuality = (await deps.weather.getAirQuality()).data;
  if (mentions(q, HEAT_WORDS)) context.heatIslands = deps.city.heat.islands;
  if (mentions(q, [...LAKE_WORDS, ...lakes.map(lake => lakeKeyword(lake.name))])) context.lakes = lakes.map(assessLake);

  return context;
}

export const contextSources = (context: AssistantContext) =>
  [
    context.weather && 'weather',
    context.airQuality && 'air_quality',
    context.heatIslands && 'heat_islands',
    context.lakes && 'lakes',
  ].filter((source): source is string => typeof source === 'string');

/** One line of readings for the model; "No specific data available." when nothing matched. */
export function buildContextSummary(context: AssistantContext): string {
  const parts: string[] = [];
  if (context.weather) {
    parts.push(`Current weather: ${context.weather.temperature}°C, ${context.weather.humidity}% humidity`);
  }
  if (context.airQuality) {
    parts.push(`Air quality: PM2.5 ${context.airQuality.pm25} μg/m³, PM10 ${context.airQuality.pm10} μg/m³`);
  }
  if (context.heatIslands) {
    parts.push(`Heat island intensity: ${context.heatIslands.intensity}°C above rural areas`);
  }
  if (context.lakes?.length) {
    const lakes = context.lakes.map(lake => `${lake.name} health ${lake.healthScore}/10 (WQI ${lake.waterQualityIndex})`);
    parts.push(`Lakes: ${lakes.join(', ')}`);
  }
  return parts.length ? parts.join('; ') : 'No specific data available.';
}

/** Append the figures the question asked about to the model's reply. */
export function enhanceReply(reply: string, query: string, context: AssistantContext): string {
  const q = query.toLowerCase();
  let enhanced = reply;

  if (context.weather && mentions(q, ['weather', 'temperature'])) {
    enhanced += `\n\n**Current Data**: Temperature is ${context.weather.temperature}°C with ${context.weather.humidity}% humidity.`;
  }

  if (context.airQuality && mentions(q, ['air', 'quality', 'pollution'])) {
    const { pm25 } = context.airQuality;
    enhanced += `\n\n**Current Air Quality**: PM2.5 is ${pm25} μg/m³ (${getPm25Level(pm25)})`;
  }

  if (context.heatIslands && mentions(q, ['heat', 'island', 'hot'])) {
    const { intensity, hotspots } = context.heatIslands;
    enhanced += `\n\n**Heat Island Effect**: Urban areas are ${intensity}°C warmer than rural areas.`;
    const top = hotspots[0];
    if (top) enhanced += ` The biggest hotspot is ${top.name} with +${top.intensity}°C.`;
  }

  if (context.lakes && mentions(q, ['lake', 'water'])) {
    const lake = context.lakes.find(candidate => q.includes(lakeKeyword(candidate.name)));
    if (lake) {
      enhanced += `\n\n**${lake.name} Status**: Water quality index ${lake.waterQualityIndex}/100, algal bloom risk: ${lake.algalBloomRisk}`;
    }
  }

  return enhanced;
}

/** Three follow-up questions on the same topic as the query. */
export function getContextualSuggestions(query: string, cityName = 'the city'): string[] {
  const q = query.toLowerCase();
  if (mentions(q, ['air', 'quality', 'pollution'])) {
    return [
      'Which areas have the cleanest air?',
      `What causes air pollution in ${cityName}?`,
      'When is the best time for outdoor exercise?',
    ];
  }
  if (mentions(q, ['temperature', 'weather', 'hot'])) {
    return [
      "What's the heat index like today?",
      'Which areas are coolest in the city?',
      'How does weather affect air quality?',
    ];
  }
  if (mentions(q, ['lake', 'water'])) {
    return [
      'Which lakes are safe for recreational activities?',
      "What's being done to restore lake health?",
      'How do lakes affect local climate?',
    ];
  }
  return [
    "What's the overall climate situation today?",
    'Are there any climate alerts for the city?',
    'What can citizens do to help with climate issues?',
  ];
}

function systemInstruction(cityName: string, stakeholder: StakeholderId) {
  return [
    `You are the climate assistant for ${cityName}'s climate resilience dashboard.`,
    `You are answering a member of: ${stakeholderLabel(stakeholder)}.`,
    'Answer questions about air quality, temperature, water bodies and urban heat islands,',
    'give actionable advice suited to that audience, and explain the data in simple terms.',
    'Use the context data for specific, current answers when it is relevant.',
  ].join(' ');
}

/** The last `HISTORY_LIMIT` messages, starting from a user turn. */
function historyWindow(messages: ChatMessage[]): ChatMessage[] {
  const window = messages.slice(-HISTORY_LIMIT);
  const firstUser = window.findIndex(message => message.role === 'user');
  return firstUser === -1 ? [] : window.slice(firstUser);
}

// ---- Operations ------------------------------------------------------------

export async function answerChat(
  deps: AssistantDeps,
  messages: ChatMessage[],
  stakeholder: StakeholderId = 'citizens',
): Promise<ChatResponse> {
  const lastUserIndex = messages.map(message => message.role).lastIndexOf('user');
  const lastUser = messages[lastUserIndex];
  if (!lastUser) throw new ChatRequestError('No user message to answer');

  const query = lastUser.content;
  const suggestions = getContextualSuggestions(query, deps.cityInfo.name);
  if (!deps.model) {
    return { status: 'unavailable', reply: UNAVAILABLE_REPLY, suggestions, contextSources: [] };
  }

  const context = await gatherContext(deps, query);
  const history = historyWindow(messages.slice(0, lastUserIndex + 1));
  const prompt = `Context data: ${buildContextSummary(context)}\n\nUser query: ${query}`;
  // The final turn carries the context blob alongside the question.
  const turns = [...history.slice(0, -1), { role: 'user' as const, content: prompt }];

  const reply = await deps.model.generate({
    systemInstruction: systemInstruction(deps.cityInfo.name, stakeholder),
    messages: turns,
    temperature: 0.7,
    maxOutputTokens: 1000,
  });

  return {
    status: 'ok',
    reply: enhanceReply(reply.trim() || EMPTY_REPLY, query, context),
    suggestions,
    contextSources: contextSources(context),
  };
}

export async function getDailySummary(deps: AssistantDeps): Promise<InsightResponse> {
  if (!deps.model) return { status: 'unavailable', text: UNAVAILABLE_SUMMARY };

  const [weather, airQuality] = await Promise.all([deps.weather.getCurrentWeather(), deps.weather.getAirQuality()]);
  const lakes = listLakes(deps.db).map(lake => ({ name: lake.name, healthScore: lake.healthScore }));
  const readings = {
    weather: weather.data,
    airQuality: airQuality.data,
    heatIslandIntensity: deps.city.heat.islands.intensity,
    lakes,
  };

  const text = await deps.model.generate({
    messages: [{
      role: 'user',
      content: [
        `Create a daily climate summary for ${deps.cityInfo.name} citizens based on this data:`,
        JSON.stringify(readings, null, 2),
        "Include today's weather highlights, air quality status with recommendations, any climate alerts, and tips for the day.",
        'Keep it brief enough for a dashboard panel.',
      ].join('\n\n'),
    }],
  });

  return { status: 'ok', text: text.trim() || 'Unable to generate daily summary.' };
}

export interface ExplainRequest {
  dataType: string;
  value: number | string;
  context?: string;
}

export async function explainDataPoint(deps: AssistantDeps, request: ExplainRequest): Promise<InsightResponse> {
  const plain = `${request.dataType}: ${request.value}`;
  if (!deps.model) return { status: 'unavailable', text: plain };

  const text = await deps.model.generate({
    messages: [{
      role: 'user',
      content: [
        'Explain this climate data point in simple language for citizens.',
        `Data type: ${request.dataType}`,
        `Value: ${request.value}`,
        `Context: ${request.context ?? ''}`,
        'Say what it means, whether it is good or bad, and what citizens should do about it. Keep it concise.',
      ].join('\n'),
    }],
  });

  return { status: 'ok', text: text.trim() || plain };
}
