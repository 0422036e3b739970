import Database from 'better-sqlite3';
import type { CityData } from './data/cityData';
import { insertReport } from './services/reports';

export type Db = Database.Database;

const ONE_HOUR_MS = 60 * 60 * 1000;

/** Open (and create if missing) the SQLite file. `:memory:` gives a throwaway database. */
export function openDatabase(path: string): Db {
  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  return db;
}

// ---------------------------------------------------------------------------
// 1. DATABASE SCHEMA: Create all tables if they don't already exist.
// ---------------------------------------------------------------------------
export function initSchema(db: Db) {
  db.exec(`
    CREATE TABLE IF NOT EXISTS lakes (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      latitude REAL NOT NULL,
      longitude REAL NOT NULL,
      area_hectares REAL NOT NULL,
      health_score REAL NOT NULL,
      pollution_level TEXT CHECK(pollution_level IN ('Low', 'Moderate', 'High')),
      pollution_sources TEXT NOT NULL DEFAULT '[]'
    );

    CREATE TABLE IF NOT EXISTS air_quality_stations (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      latitude REAL NOT NULL,
      longitude REAL NOT NULL,
      aqi INTEGER,
      pm25 REAL,
      pm10 REAL,
      no2 REAL,
      station_type TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS alerts (
      id TEXT PRIMARY KEY,
      type TEXT NOT NULL,
      location TEXT NOT NULL,
      severity TEXT CHECK(severity IN ('High', 'Moderate', 'Low')),
      created_at DATETIME NOT NULL
    );

    CREATE TABLE IF NOT EXISTS community_reports (
      reference_id TEXT PRIMARY KEY,
      type TEXT NOT NULL,
      severity TEXT CHECK(severity IN ('Low', 'Medium', 'High', 'Critical')),
      status TEXT CHECK(status IN ('Open', 'Acknowledged', 'Assigned', 'In Progress', 'Resolved', 'Closed')),
      description TEXT NOT NULL,
      latitude REAL NOT NULL,
      longitude REAL NOT NULL,
      address TEXT,
      contact TEXT,
      anonymous INTEGER NOT NULL DEFAULT 0,
      assigned_to TEXT,
      created_at DATETIME NOT NULL,
      updated_at DATETIME NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_reports_created ON community_reports(created_at DESC);

    CREATE TABLE IF NOT EXISTS api_snapshots (
      snapshot_key TEXT PRIMARY KEY,
      payload TEXT NOT NULL,
      fetched_at DATETIME NOT NULL
    );
  `);
}

// ---------------------------------------------------------------------------
// 2. SEED DATA: Static city datasets are inserted idempotently (INSERT OR IGNORE);
//    sample community reports only go into an empty table.
// ---------------------------------------------------------------------------
export function seedDatabase(db: Db, city: CityData, now: Date = new Date()) {
  const insertLake = db.prepare(
    'INSERT OR IGNORE INTO lakes (id, name, latitude, longitude, area_hectares, health_score, pollution_level, pollution_sources) VALUES (?, ?, ?, ?, ?, ?, ?, ?)',
  );
  const insertStation = db.prepare(
    'INSERT OR IGNORE INTO air_quality_stations (id, name, latitude, longitude, aqi, pm25, pm10, no2, station_type) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)',
  );
  const insertAlert = db.prepare('INSERT OR IGNORE INTO alerts (id, type, location, severity, created_at) VALUES (?, ?, ?, ?, ?)');
  const hasReports = db.prepare('SELECT 1 FROM community_reports LIMIT 1');

  const seed = db.transaction(() => {
    for (const lake of city.lakes) {
      insertLake.run(
        lake.id, lake.name, lake.latitude, lake.longitude, lake.areaHectares,
        lake.healthScore, lake.pollutionLevel, JSON.stringify(lake.pollutionSources),
      );
    }

    for (const station of city.stations) {
      insertStation.run(
        station.id, station.name, station.latitude, station.longitude,
        station.aqi, station.pm25, station.pm10, station.no2, station.stationType,
      );
    }

    for (const alert of city.alerts) {
      const createdAt = new Date(now.getTime() - alert.hoursAgo * ONE_HOUR_MS).toISOString();
      insertAlert.run(alert.id, alert.type, alert.location, alert.severity, createdAt);
    }

    if (!hasReports.get()) {
      // Oldest first so reference numbers follow submission order.
      const ordered = [...city.reports].sort((a, b) => b.hoursAgo - a.hoursAgo);
      for (const report of ordered) {
        const createdAt = new Date(now.getTime() - report.hoursAgo * ONE_HOUR_MS);
        insertReport(db, {
          type: report.type,
          severity: report.severity,
          status: report.status,
          description: report.description,
          latitude: report.latitude,
          longitude: report.longitude,
          address: null,
          contact: null,
          anonymous: false,
        }, createdAt);
      }
    }
  });

  seed();
}
