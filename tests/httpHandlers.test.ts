import { jest, describe, it, expect, beforeEach } from "@jest/globals";
import type express from "express";
import {
  createBotsHandler,
  createHealthHandler,
  createPoolStatsHandler,
  pingHandler,
  type HttpDeps,
} from "../src/httpHandlers.ts";
import { createBotInstance, createFakeSpawner } from "./fakeSpawner.ts";

let fakeSpawner: ReturnType<typeof createFakeSpawner>;
let mainBotRunning: boolean;
let deps: HttpDeps;

function createRes() {
  const res = {
    status: jest.fn(),
    json: jest.fn(),
    send: jest.fn(),
  };
  res.status.mockReturnValue(res);
  return { res, typed: res as unknown as express.Response };
}

const req = {} as express.Request;

beforeEach(() => {
  fakeSpawner = createFakeSpawner();
  mainBotRunning = true;
  deps = { spawner: fakeSpawner.spawner, isMainBotRunning: () => mainBotRunning };
});

describe("pingHandler", () => {
  it("answers pong", () => {
    const { res, typed } = createRes();
    pingHandler(req, typed);
    expect(res.send).toHaveBeenCalledWith("pong");
  });
});

describe("createHealthHandler", () => {
  it("reports healthy state", () => {
    fakeSpawner.fake.listBots.mockReturnValue([createBotInstance()]);
    const { res, typed } = createRes();

    createHealthHandler(deps)(req, typed);

    expect(res.status).toHaveBeenCalledWith(200);
    expect(res.json).toHaveBeenCalledWith({ healthy: true, errors: [] });
  });

  it("reports lost runtimes and a stopped main bot", () => {
    mainBotRunning = false;
    fakeSpawner.fake.listBots.mockReturnValue([
      createBotInstance(),
      createBotInstance({ name: "Stopped", token: "222:bbbbb22222", status: "stopped" }),
    ]);
    fakeSpawner.fake.isRunning.mockReturnValue(false);
    const { res, typed } = createRes();

    createHealthHandler(deps)(req, typed);

    expect(res.status).toHaveBeenCalledWith(503);
    expect(res.json).toHaveBeenCalledWith({
      healthy: false,
      errors: ["BotMother is not running", "Bot EchoA is not running"],
    });
  });
});

describe("createPoolStatsHandler", () => {
  it("returns spawner stats", () => {
    const stats = {
      totalTokens: 2,
      availableTokens: 1,
      allocatedTokens: 1,
      activeBots: 1,
      statusBreakdown: { running: 1 },
      runningRuntimes: 1,
      botfatherAutomation: false,
    };
    fakeSpawner.fake.getStats.mockReturnValue(stats);
    const { res, typed } = createRes();

    createPoolStatsHandler(deps)(req, typed);

    expect(res.json).toHaveBeenCalledWith(stats);
  });
});

describe("createBotsHandler", () => {
  it("lists bots with masked tokens", () => {
    fakeSpawner.fake.listBots.mockReturnValue([createBotInstance({ personalityType: "pirate" })]);
    const { res, typed } = createRes();

    createBotsHandler(deps)(req, typed);

    expect(fakeSpawner.fake.listBots).toHaveBeenCalledWith();
    expect(res.json).toHaveBeenCalledWith([
      {
        name: "EchoA",
        username: "echoa_bot",
        status: "running",
        created_at: "2026-01-02T03:04:05.000Z",
        user_id: "42",
        personality_type: "pirate",
        token: "111:aaaaa1...",
        running: true,
      },
    ]);
  });
});
