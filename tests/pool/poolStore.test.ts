import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import fs from "fs";
import os from "os";
import path from "path";
import {
  botToPersisted,
  parsePool,
  readPoolFile,
  serializePool,
  writePoolFile,
} from "../../src/pool/poolStore.ts";
import type { BotInstance } from "../../src/types.ts";

const T1 = "111:aaaaa11111";

const bot: BotInstance = {
  token: T1,
  name: "EchoA",
  username: "echo_a_bot",
  status: "running",
  createdAt: new Date("2026-03-04T05:06:07.000Z"),
  userId: "42",
};

describe("botToPersisted", () => {
  it("uses snake_case keys and nulls for missing values", () => {
    expect(botToPersisted(bot)).toEqual({
      token: T1,
      name: "EchoA",
      username: "echo_a_bot",
      status: "running",
      created_at: "2026-03-04T05:06:07.000Z",
      user_id: "42",
      personality_type: null,
    });
  });
});

describe("parsePool", () => {
  it("restores bots from the document", () => {
    const raw = JSON.stringify(serializePool({ availableTokens: ["222:bbbbb22222"], activeBots: new Map([[T1, bot]]) }));
    const snapshot = parsePool(raw);
    expect(snapshot.availableTokens).toEqual(["222:bbbbb22222"]);
    expect(snapshot.activeBots.get(T1)).toEqual({ ...bot, personalityType: undefined });
  });

  it("defaults missing sections and status", () => {
    const snapshot = parsePool(
      JSON.stringify({
        active_bots: { [T1]: { token: T1, name: "A", created_at: "2026-01-01T00:00:00Z" } },
      }),
    );
    expect(snapshot.availableTokens).toEqual([]);
    expect(snapshot.activeBots.get(T1)?.status).toBe("starting");
  });

  it("takes the token from the map key", () => {
    const snapshot = parsePool(
      JSON.stringify({
        available_tokens: [],
        active_bots: { [T1]: { token: "other", name: "A", created_at: "2026-01-01T00:00:00Z" } },
      }),
    );
    expect(snapshot.activeBots.get(T1)?.token).toBe(T1);
  });

  it("turns numeric user ids into strings", () => {
    const snapshot = parsePool(
      JSON.stringify({
        active_bots: { [T1]: { token: T1, name: "A", created_at: "2026-01-01T00:00:00Z", user_id: 42 } },
      }),
    );
    expect(snapshot.activeBots.get(T1)?.userId).toBe("42");
  });

  it("throws on unknown status", () => {
    const raw = JSON.stringify({
      active_bots: { [T1]: { token: T1, name: "A", status: "paused", created_at: "2026-01-01T00:00:00Z" } },
    });
    expect(() => parsePool(raw)).toThrow();
  });

  it("throws on invalid JSON", () => {
    expect(() => parsePool("[")).toThrow();
  });
});

describe("pool file", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "store-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("returns undefined for a missing file", () => {
    expect(readPoolFile(path.join(dir, "missing.json"))).toBeUndefined();
  });

  it("creates the directory and writes pretty JSON", () => {
    const file = path.join(dir, "nested", "pool.json");
    writePoolFile(file, { availableTokens: [T1], activeBots: new Map() });
    expect(fs.readFileSync(file, "utf8")).toBe(
      JSON.stringify({ available_tokens: [T1], active_bots: {} }, null, 2),
    );
    expect(readPoolFile(file)?.availableTokens).toEqual([T1]);
  });
});
