import express from "express";
import { createServer as createViteServer } from "vite";
import path from "path";
import { fileURLToPath } from "url";
import { createApp } from "./src/server/app";
import { loadConfig } from "./src/server/config";
import { loadCityData, loadGuidance } from "./src/server/data/cityData";
import { initSchema, openDatabase, seedDatabase } from "./src/server/db";
import { GeminiChatModel } from "./src/server/services/chat";

// ---------------------------------------------------------------------------
// SERVER STARTUP: Dev mode embeds Vite as middleware; production serves
// the pre-built dist/ folder and falls back to index.html for SPA routing.
// ---------------------------------------------------------------------------

async function startServer() {
  const config = loadConfig();
  const city = loadCityData();
  const guidance = loadGuidance();

  /** SQLite database: auto-created on first run at DATABASE_PATH. */
  const db = openDatabase(config.databasePath);
  initSchema(db);
  seedDatabase(db, city);

  const chatModel = config.gemini.apiKey ? new GeminiChatModel(config.gemini.apiKey, config.gemini.model) : null;
  if (!chatModel) console.warn("GEMINI_API_KEY is not set; the assistant will answer as unavailable.");

  const app = createApp({ db, config, city, guidance, chatModel });

  if (config.env !== "production") {
    // Development: Vite handles HMR and module transforms via middleware.
    const vite = await createViteServer({
      server: { middlewareMode: true },
      appType: "spa",
    });
    app.use(vite.middlewares);
  } else {
    // Production: serve the static Vite build output.
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = path.dirname(__filename);
    const distPath = path.join(__dirname, "dist");

    app.use(express.static(distPath));

    // SPA catch-all: return index.html for all non-API GET requests.
    app.get("*", (_req, res) => {
      res.sendFile(path.join(distPath, "index.html"));
    });
  }

  app.listen(config.port, config.host, () => {
    console.log(`${config.city.name} climate dashboard running on http://localhost:${config.port}`);
  });
}

startServer().catch(err => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
