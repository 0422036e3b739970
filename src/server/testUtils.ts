import { loadConfig } from './config';
import { loadCityData, loadGuidance } from './data/cityData';
import { initSchema, openDatabase, seedDatabase } from './db';
import type { FetchFn } from './http';

export const TEST_NOW = new Date('2026-06-15T12:00:00.000Z');

/** Seeded in-memory database with the bundled city data. */
export function createTestDb(now: Date = TEST_NOW) {
  const db = openDatabase(':memory:');
  initSchema(db);
  const city = loadCityData();
  seedDatabase(db, city, now);
  return { db, city, guidance: loadGuidance() };
}

/** Defaults with retries off so an offline fetch falls through at once. */
export const testConfig = (env: NodeJS.ProcessEnv = {}) => loadConfig({ HTTP_MAX_RETRIES: '0', NODE_ENV: 'test', ...env });

export const offlineFetch: FetchFn = async () => {
  throw new Error('offline');
};

export const jsonResponse = (body: unknown, status = 200) => new Response(JSON.stringify(body), { status });
