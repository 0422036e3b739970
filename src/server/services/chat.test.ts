import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { AirQualityReading, ChatMessage } from '../../types';
import { createTestDb, offlineFetch, testConfig, TEST_NOW } from '../testUtils';
import {
  answerChat,
  buildContextSummary,
  ChatRequestError,
  contextSources,
  enhanceReply,
  explainDataPoint,
  gatherContext,
  getContextualSuggestions,
  getDailySummary,
  UNAVAILABLE_REPLY,
  UNAVAILABLE_SUMMARY,
  type AssistantDeps,
  type ChatModel,
  type GenerateRequest,
} from './chat';
import { WeatherService } from './weather';

/** Records every request and answers with a canned reply. */
class FakeChatModel implements ChatModel {
  readonly requests: GenerateRequest[] = [];

  constructor(private readonly reply = 'Here is what I found.') {}

  async generate(request: GenerateRequest) {
    this.requests.push(request);
    return this.reply;
  }
}

const LAKE_SUMMARY =
  'Lakes: Agara Lake health 4.7/10 (WQI 60), Bellandur Lake health 3.2/10 (WQI 40), Hebbal Lake health 5.9/10 (WQI 50), ' +
  'Sankey Tank health 7.5/10 (WQI 70), Ulsoor Lake health 6.8/10 (WQI 60), Varthur Lake health 4.1/10 (WQI 50)';

describe('assistant', () => {
  let env: ReturnType<typeof createTestDb>;

  const deps = (model: ChatModel | null): AssistantDeps => ({
    db: env.db,
    weather: new WeatherService({
      db: env.db,
      config: testConfig(),
      city: env.city,
      fetchFn: offlineFetch,
      rng: () => 0.5,
      now: () => TEST_NOW,
    }),
    city: env.city,
    cityInfo: testConfig().city,
    model,
  });

  const ask = (content: string): ChatMessage[] => [{ role: 'user', content }];

  beforeEach(() => {
    env = createTestDb();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    env.db.close();
    vi.restoreAllMocks();
  });

  describe('gatherContext', () => {
    it('loads only what the question mentions', async () => {
      const context = await gatherContext(deps(null), 'How is Bellandur doing?');
      expect(contextSources(context)).toEqual(['lakes']);
    });

    it('reads weather and air quality for mixed questions', async () => {
      const context = await gatherContext(deps(null), 'Is the air bad in this weather?');
      expect(contextSources(context)).toEqual(['weather', 'air_quality']);
      expect(context.weather?.temperature).toBe(32.5);
      expect(context.airQuality?.pm25).toBe(68);
    });
  });

  describe('buildContextSummary', () => {
    it('says so when nothing matched', () => {
      expect(buildContextSummary({})).toBe('No specific data available.');
    });

    it('joins each reading into one line', async () => {
      const context = await gatherContext(deps(null), 'temperature and air near the heat island');
      expect(buildContextSummary(context)).toBe(
        'Current weather: 32.5°C, 65% humidity; Air quality: PM2.5 68 μg/m³, PM10 98 μg/m³; Heat island intensity: 3.2°C above rural areas',
      );
    });
  });

  describe('enhanceReply', () => {
    it('appends air quality and heat island figures', () => {
      const airQuality: AirQualityReading = {
        aqi: 157, pm25: 68, pm10: 98, no2: 45, so2: 12, o3: 38, co: 0.9,
        dominantPollutant: 'pm25', category: 'Poor', observedAt: TEST_NOW.toISOString(),
      };
      expect(enhanceReply('Reply.', 'air pollution and heat', { airQuality, heatIslands: env.city.heat.islands })).toBe(
        'Reply.' +
        '\n\n**Current Air Quality**: PM2.5 is 68 μg/m³ (Poor)' +
        '\n\n**Heat Island Effect**: Urban areas are 3.2°C warmer than rural areas. The biggest hotspot is Electronic City with +4.2°C.',
      );
    });

    it('leaves the reply alone when the question asks for nothing loaded', () => {
      expect(enhanceReply('Reply.', 'hello', { heatIslands: env.city.heat.islands })).toBe('Reply.');
    });
  });

  describe('getContextualSuggestions', () => {
    it('follows the topic of the question', () => {
      expect(getContextualSuggestions('Air quality today?', 'Bengaluru')).toEqual([
        'Which areas have the cleanest air?',
        'What causes air pollution in Bengaluru?',
        'When is the best time for outdoor exercise?',
      ]);
      expect(getContextualSuggestions('Is it hot?')[0]).toBe("What's the heat index like today?");
      expect(getContextualSuggestions('Lake levels?')[0]).toBe('Which lakes are safe for recreational activities?');
      expect(getContextualSuggestions('Hello')[0]).toBe("What's the overall climate situation today?");
    });
  });

  describe('answerChat', () => {
    it('reports the assistant as unavailable without a model', async () => {
      await expect(answerChat(deps(null), ask('How hot is it?'))).resolves.toEqual({
        status: 'unavailable',
        reply: UNAVAILABLE_REPLY,
        suggestions: [
          "What's the heat index like today?",
          'Which areas are coolest in the city?',
          'How does weather affect air quality?',
        ],
        contextSources: [],
      });
    });

    it('rejects a conversation with no user message', async () => {
      await expect(answerChat(deps(null), [{ role: 'assistant', content: 'Hi' }])).rejects.toThrow(ChatRequestError);
    });

    it('sends the question with its context and enriches the reply', async () => {
      const model = new FakeChatModel();
      const response = await answerChat(deps(model), ask('How is Bellandur lake doing?'), 'water-board');

      expect(response).toEqual({
        status: 'ok',
        reply: 'Here is what I found.\n\n**Bellandur Lake Status**: Water quality index 40/100, algal bloom risk: High',
        suggestions: [
          'Which lakes are safe for recreational activities?',
          "What's being done to restore lake health?",
          'How do lakes affect local climate?',
        ],
        contextSources: ['lakes'],
      });

      const [request] = model.requests;
      expect(request?.temperature).toBe(0.7);
      expect(request?.maxOutputTokens).toBe(1000);
      expect(request?.systemInstruction).toContain('You are answering a member of: BWSSB (Water Board).');
      expect(request?.messages).toEqual([
        { role: 'user', content: `Context data: ${LAKE_SUMMARY}\n\nUser query: How is Bellandur lake doing?` },
      ]);
    });

    it('keeps the last ten messages, starting from a user turn', async () => {
      const model = new FakeChatModel();
      const conversation: ChatMessage[] = Array.from({ length: 13 }, (_, i) => ({
        role: i % 2 === 0 ? 'user' : 'assistant',
        content: `message ${i}`,
      }));
      await answerChat(deps(model), conversation);

      const messages = model.requests[0]?.messages ?? [];
      expect(messages).toHaveLength(9);
      expect(messages[0]).toEqual({ role: 'user', content: 'message 4' });
      expect(messages[7]).toEqual({ role: 'assistant', content: 'message 11' });
      expect(messages[8]?.content).toBe('Context data: No specific data available.\n\nUser query: message 12');
    });

    it('answers the latest user turn when the conversation ends with the assistant', async () => {
      const model = new FakeChatModel();
      await answerChat(deps(model), [
        { role: 'user', content: 'first question' },
        { role: 'assistant', content: 'first answer' },
      ]);
      expect(model.requests[0]?.messages).toEqual([
        { role: 'user', content: 'Context data: No specific data available.\n\nUser query: first question' },
      ]);
    });

    it('substitutes an apology for an empty reply', async () => {
      const response = await answerChat(deps(new FakeChatModel('   ')), ask('hello'));
      expect(response.reply).toBe("I'm sorry, I couldn't generate a response at this time.");
    });

    it('propagates model failures', async () => {
      const failing: ChatModel = { generate: () => Promise.reject(new Error('quota exceeded')) };
      await expect(answerChat(deps(failing), ask('hello'))).rejects.toThrow('quota exceeded');
    });
  });

  describe('insights', () => {
    it('returns placeholders without a model', async () => {
      await expect(getDailySummary(deps(null))).resolves.toEqual({ status: 'unavailable', text: UNAVAILABLE_SUMMARY });
      await expect(explainDataPoint(deps(null), { dataType: 'AQI', value: 157 })).resolves.toEqual({ status: 'unavailable', text: 'AQI: 157' });
    });

    it('summarizes the current readings', async () => {
      const model = new FakeChatModel('  Warm and hazy today.  ');
      await expect(getDailySummary(deps(model))).resolves.toEqual({ status: 'ok', text: 'Warm and hazy today.' });
      const prompt = model.requests[0]?.messages[0]?.content ?? '';
      expect(prompt).toContain('Create a daily climate summary for Bengaluru citizens based on this data:');
      expect(prompt).toContain('"heatIslandIntensity": 3.2');
    });

    it('explains a data point in plain words', async () => {
      const model = new FakeChatModel('An AQI of 157 is unhealthy.');
      await expect(explainDataPoint(deps(model), { dataType: 'AQI', value: 157, context: 'Silk Board' }))
        .resolves.toEqual({ status: 'ok', text: 'An AQI of 157 is unhealthy.' });
      expect(model.requests[0]?.messages[0]?.content).toContain('Value: 157\nContext: Silk Board');
    });
  });
});
