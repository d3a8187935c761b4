import express from "express";
import { getHealthStatus } from "./healthcheck.ts";
import { maskToken } from "./helpers.ts";
import type { BotSpawner } from "./spawner/botSpawner.ts";

export type HttpDeps = {
  spawner: BotSpawner;
  isMainBotRunning: () => boolean;
};

export function pingHandler(_req: express.Request, res: express.Response) {
  res.send("pong");
}

export function createHealthHandler({ spawner, isMainBotRunning }: HttpDeps) {
  return (_req: express.Request, res: express.Response) => {
    const health = getHealthStatus(spawner, isMainBotRunning());
    res.status(health.healthy ? 200 : 503).json(health);
  };
}

export function createPoolStatsHandler({ spawner }: HttpDeps) {
  return (_req: express.Request, res: express.Response) => {
    res.json(spawner.getStats());
  };
}

// tokens are masked, the endpoint has no auth
export function createBotsHandler({ spawner }: HttpDeps) {
  return (_req: express.Request, res: express.Response) => {
    res.json(
      spawner.listBots().map((bot) => ({
        name: bot.name,
        username: bot.username ?? null,
        status: bot.status,
        created_at: bot.createdAt.toISOString(),
        user_id: bot.userId ?? null,
        personality_type: bot.personalityType ?? null,
        token: maskToken(bot.token),
        running: spawner.isRunning(bot.token),
      })),
    );
  };
}

export function createHttpApp(deps: HttpDeps) {
  const app = express();
  app.use(express.json());

  app.use((_req, res, next) => {
    res.contentType("application/json; charset=utf-8");
    next();
  });

  app.get("/ping", pingHandler);
  app.get("/health", createHealthHandler(deps));
  app.get("/pool/stats", createPoolStatsHandler(deps));
  app.get("/bots", createBotsHandler(deps));

  return app;
}
