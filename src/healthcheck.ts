import http from "http";
import { fileURLToPath } from "url";
import { resolve } from "path";
import type { BotSpawner } from "./spawner/botSpawner.ts";

export type HealthResponse = {
  healthy: boolean;
  errors: string[];
};

/** Bots marked running in the pool must have a polling runtime. */
export function getHealthStatus(spawner: BotSpawner, mainBotRunning: boolean): HealthResponse {
  const errors: string[] = [];

  if (!mainBotRunning) {
    errors.push("BotMother is not running");
  }

  for (const bot of spawner.listBots()) {
    if (bot.status === "running" && !spawner.isRunning(bot.token)) {
      errors.push(`Bot ${bot.name} is not running`);
    }
  }

  return { healthy: errors.length === 0, errors };
}

export async function request(path: string): Promise<{
  statusCode: number;
  data: string;
}> {
  return new Promise((resolve) => {
    const req = http.get({ host: "localhost", port: process.env.PORT || 7586, path }, (res) => {
      let data = "";
      res.on("data", (c) => (data += c));
      res.on("end", () => resolve({ statusCode: res.statusCode || 0, data }));
    });
    req.on("error", () => resolve({ statusCode: 0, data: "" }));
  });
}

function isHealthResponse(value: unknown): value is HealthResponse {
  return (
    typeof value === "object" &&
    value !== null &&
    "healthy" in value &&
    typeof value.healthy === "boolean" &&
    "errors" in value &&
    Array.isArray(value.errors)
  );
}

export const runHealthcheck = async () => {
  const ping = await request("/ping");
  if (ping.statusCode !== 200) {
    console.error("Ping failed");
    return false;
  }
  const health = await request("/health");
  if (health.statusCode !== 200 && health.statusCode !== 503) {
    console.error("Health endpoint unavailable");
    return false;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(health.data);
  } catch {
    parsed = undefined;
  }
  if (!isHealthResponse(parsed)) {
    console.error("Invalid health response");
    return false;
  }
  if (!parsed.healthy) {
    console.error(parsed.errors.join("\n"));
    return false;
  }
  return true;
};

(async () => {
  const isMain = (() => {
    const currentFilePath = fileURLToPath(import.meta.url);
    const scriptPath = process.argv[1] ? resolve(process.cwd(), process.argv[1]) : "";
    return scriptPath === currentFilePath;
  })();
  if (isMain) {
    const ok = await runHealthcheck();
    process.exit(ok ? 0 : 1);
  }
})().catch((error: unknown) => {
  console.error("Healthcheck failed:", error);
  process.exit(1);
});
