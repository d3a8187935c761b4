import { jest, describe, it, expect } from "@jest/globals";
import {
  BotFatherAutomation,
  generateDisplayName,
  generateUsername,
  type BotFatherSession,
} from "../../src/botfather/automation.ts";

class FakeSession implements BotFatherSession {
  sent: string[] = [];
  closed = false;

  constructor(
    private readonly replies: string[],
    private readonly failOnSend = false,
    private readonly failOnClose = false,
  ) {}

  async sendMessage(text: string) {
    if (this.failOnSend) throw new Error("FLOOD_WAIT");
    this.sent.push(text);
  }

  async getRecentMessages(limit: number) {
    return this.replies.slice(0, limit);
  }

  async close() {
    if (this.failOnClose) throw new Error("disconnect timeout");
    this.closed = true;
  }
}

const now = new Date(2026, 2, 4, 5, 6);

function createAutomation(session: FakeSession) {
  const sleep = jest.fn(async (_ms: number) => {});
  const automation = new BotFatherAutomation({
    openSession: async () => session,
    sleep,
    now: () => now,
    random: () => 0,
  });
  return { automation, sleep };
}

describe("generateDisplayName", () => {
  it("keeps letters, digits and spaces and adds a timestamp", () => {
    expect(generateDisplayName("My Cool Bot!", now)).toBe("My Cool Bot 0304_0506");
  });

  it("cuts long names to 20 characters", () => {
    expect(generateDisplayName("A very long bot name that keeps going", now)).toBe("A very long bot name 0304_0506");
  });

  it("falls back when nothing usable is left", () => {
    expect(generateDisplayName("🤖🤖", now)).toBe("GeneratedBot 0304_0506");
  });
});

describe("generateUsername", () => {
  it("builds a lowercase username ending in _bot", () => {
    expect(generateUsername("My Cool Bot!", () => 0)).toBe("mycoolbot_aaaaaa_bot");
    expect(generateUsername("My Cool Bot!", () => 0.999)).toBe("mycoolbot_999999_bot");
  });

  it("falls back for names without latin characters", () => {
    expect(generateUsername("Очень", () => 0)).toBe("generated_aaaaaa_bot");
  });
});

describe("BotFatherAutomation.createBot", () => {
  it("returns the token from the reply", async () => {
    const session = new FakeSession([
      "Done! Congratulations on your new bot. Use this token to access the HTTP API:\n7654321:AAF-test_secret",
    ]);
    const { automation, sleep } = createAutomation(session);

    const result = await automation.createBot("My Cool Bot!");

    expect(result).toEqual({
      success: true,
      token: "7654321:AAF-test_secret",
      username: "mycoolbot_aaaaaa_bot",
      displayName: "My Cool Bot 0304_0506",
    });
    expect(session.sent).toEqual(["/newbot", "My Cool Bot 0304_0506", "mycoolbot_aaaaaa_bot"]);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 2000, 3000]);
    expect(session.closed).toBe(true);
  });

  it("keeps the token when the session fails to close", async () => {
    const session = new FakeSession(
      ["Done! Congratulations on your new bot. Use this token to access the HTTP API:\n7654321:AAF-test_secret"],
      false,
      true,
    );
    const { automation } = createAutomation(session);

    expect(await automation.createBot("My Cool Bot!")).toEqual({
      success: true,
      token: "7654321:AAF-test_secret",
      username: "mycoolbot_aaaaaa_bot",
      displayName: "My Cool Bot 0304_0506",
    });
    expect(console.warn).toHaveBeenCalledWith(
      expect.stringContaining("[WARN] Failed to close BotFather session: disconnect timeout"),
    );
  });

  it("reports a rejection", async () => {
    const reply = "Sorry, this username is already taken. Please try something different.";
    const { automation } = createAutomation(new FakeSession([reply]));

    expect(await automation.createBot("Taken")).toEqual({
      success: false,
      error: `BotFather rejected: ${reply}`,
      errorCode: "BOTFATHER_ERROR",
    });
  });

  it("reports an unclear reply", async () => {
    const { automation } = createAutomation(new FakeSession(["Alright, a new bot. How are we going to call it?"]));

    expect(await automation.createBot("Quiet")).toEqual({
      success: false,
      error: "Unclear response from BotFather",
      errorCode: "AMBIGUOUS_RESPONSE",
    });
  });

  it("reports client failures and closes the session", async () => {
    const session = new FakeSession([], true);
    const { automation } = createAutomation(session);

    expect(await automation.createBot("Any")).toEqual({
      success: false,
      error: "BotFather automation failed: FLOOD_WAIT",
      errorCode: "CLIENT_ERROR",
    });
    expect(session.closed).toBe(true);
  });

  it("reports a session that cannot be opened", async () => {
    const automation = new BotFatherAutomation({
      openSession: async () => {
        throw new Error("BotFather session is not authorized");
      },
      sleep: async () => {},
    });

    expect(await automation.createBot("Any")).toMatchObject({
      success: false,
      errorCode: "CLIENT_ERROR",
      error: "BotFather automation failed: BotFather session is not authorized",
    });
  });
});

describe("BotFatherAutomation.configureCommands", () => {
  const commands = [
    { command: "start", description: "Welcome" },
    { command: "help", description: "Help" },
  ];

  it("sends the command list", async () => {
    const session = new FakeSession(["Success! Command list updated. /help"]);
    const { automation } = createAutomation(session);

    expect(await automation.configureCommands("@my_bot", commands)).toEqual({ success: true });
    expect(session.sent).toEqual(["/setcommands", "@my_bot", "start - Welcome\nhelp - Help"]);
    expect(session.closed).toBe(true);
  });

  it("reports a rejected update", async () => {
    const { automation } = createAutomation(new FakeSession(["Invalid bot selected."]));

    expect(await automation.configureCommands("my_bot", commands)).toEqual({
      success: false,
      error: "BotFather rejected command configuration: Invalid bot selected.",
    });
  });

  it("still reports success when the session fails to close", async () => {
    const { automation } = createAutomation(new FakeSession(["Success! Command list updated."], false, true));
    expect(await automation.configureCommands("my_bot", commands)).toEqual({ success: true });
  });

  it("treats silence as success", async () => {
    const { automation } = createAutomation(new FakeSession([]));
    expect(await automation.configureCommands("my_bot", commands)).toEqual({ success: true });
  });
});
