import { describe, it, expect } from "@jest/globals";
import { call } from "../../src/tools/stop_bot.ts";
import { createBotInstance, createFakeSpawner } from "../fakeSpawner.ts";

describe("stop_bot", () => {
  it("stops the bot on behalf of the user", async () => {
    const { fake, spawner } = createFakeSpawner();
    fake.stopBot.mockResolvedValue({ success: true, bot: createBotInstance(), message: "Bot 'EchoA' stopped" });

    expect(await call({ spawner, userId: "42" }).stop_bot({ name: "EchoA" })).toEqual({
      content: "Bot 'EchoA' stopped",
    });
    expect(fake.stopBot).toHaveBeenCalledWith("EchoA", "42");
  });

  it("passes the error through", async () => {
    const { fake, spawner } = createFakeSpawner();
    fake.stopBot.mockResolvedValue({ success: false, error: "Bot 'Nope' not found in your bot list" });

    expect(await call({ spawner, userId: "42" }).stop_bot({ name: "Nope" })).toEqual({
      content: "Bot 'Nope' not found in your bot list",
    });
  });
});
