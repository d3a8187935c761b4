import type http from "node:http";
import type { Telegraf } from "telegraf";
import { BotMotherAgent } from "./agent.ts";
import { BotFatherAutomation } from "./botfather/automation.ts";
import { useBot, validateBotToken } from "./bot.ts";
import { initCommands } from "./commands.ts";
import { useConfig, validateConfig } from "./config.ts";
import { errorMessage, log } from "./helpers.ts";
import { useApi } from "./helpers/useApi.ts";
import { createHttpApp } from "./httpHandlers.ts";
import { TokenPoolManager } from "./pool/tokenPoolManager.ts";
import { createChildBotFactory } from "./runtime/createChildBot.ts";
import { BotSpawner } from "./spawner/botSpawner.ts";
import type { BotFatherConfigType, ConfigType } from "./types.ts";

const DEFAULT_POOL_FILE = "data/bot_token_pool.json";
const DEFAULT_HTTP_PORT = 7586;

let mainBot: Telegraf | undefined;
let mainBotRunning = false;
let spawner: BotSpawner | undefined;
let httpServer: http.Server | null = null;
let shuttingDown = false;

process.on("unhandledRejection", (reason) => {
  log({ msg: `Unhandled rejection: ${errorMessage(reason)}`, logLevel: "error" });
});

if (process.env.NODE_ENV !== "test") {
  start().catch((error: unknown) => {
    log({ msg: `Startup failed: ${errorMessage(error)}`, logLevel: "error" });
    process.exit(1);
  });
}

// gramjs is only loaded when the automation is enabled
async function createMinter(config: BotFatherConfigType) {
  const { gramjsSessionFactory } = await import("./botfather/gramjsSession.ts");
  return new BotFatherAutomation({
    openSession: gramjsSessionFactory(config),
    responseDelayMs: config.response_delay_ms,
  });
}

export async function createSpawner(config: ConfigType, pool: TokenPoolManager) {
  return new BotSpawner({
    pool,
    createChildBot: createChildBotFactory({
      ai: config.ai,
      personalities: config.personalities,
      api: useApi,
    }),
    minter: config.botfather.enabled ? await createMinter(config.botfather) : undefined,
    validateToken: (token) => validateBotToken(token),
    mintedBotCommands: config.botfather.commands,
    maxBotsPerUser: config.pool.max_bots_per_user,
    resumeBots: config.pool.resume_bots,
    cleanupOnStartup: config.pool.cleanup_on_startup,
  });
}

export async function start() {
  const config = useConfig();
  if (!validateConfig(config)) {
    console.log("Invalid config, exiting...");
    process.exit(1);
  }

  const pool = new TokenPoolManager({
    poolFile: config.pool.file || DEFAULT_POOL_FILE,
    configTokens: config.pool.tokens,
    recycleTokens: config.pool.recycle_tokens,
  });
  const botSpawner = await createSpawner(config, pool);
  spawner = botSpawner;
  const agent = new BotMotherAgent({
    api: useApi(),
    spawner: botSpawner,
    ai: config.ai,
    personalities: config.personalities,
  });

  await botSpawner.initialize();

  const bot = useBot(config.auth.bot_token);
  mainBot = bot;
  bot.catch((err, ctx) => {
    log({
      msg: `Unhandled error for update ${ctx.update.update_id}: ${errorMessage(err)}`,
      botName: config.bot_name,
      logLevel: "error",
    });
  });
  await initCommands(bot, { config, pool, spawner: botSpawner, agent });

  bot
    .launch({ dropPendingUpdates: true }, () => {
      mainBotRunning = true;
      log({ msg: "bot started", botName: config.bot_name });
    })
    .then(
      () => {
        mainBotRunning = false;
      },
      (error: unknown) => {
        mainBotRunning = false;
        log({ msg: `Polling stopped with error: ${errorMessage(error)}`, botName: config.bot_name, logLevel: "error" });
      },
    );

  const port = config.http.port || DEFAULT_HTTP_PORT;
  httpServer = createHttpApp({ spawner: botSpawner, isMainBotRunning: () => mainBotRunning }).listen(
    port,
    () => {
      log({ msg: `http server listening on port ${port}` });
    },
  );

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          log({ msg: `Shutdown failed: ${errorMessage(error)}`, logLevel: "error" });
          process.exit(1);
        },
      );
    });
  }
}

async function closeHttpServer() {
  if (!httpServer) return;
  await new Promise<void>((resolve) => {
    httpServer?.close(() => resolve());
  });
  httpServer = null;
}

export async function shutdown(reason: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  log({ msg: `Shutting down: ${reason}` });

  if (mainBot && mainBotRunning) {
    mainBot.stop(reason);
    mainBotRunning = false;
  }
  await spawner?.shutdown();
  await closeHttpServer();
}
