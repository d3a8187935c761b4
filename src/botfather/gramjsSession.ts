import { TelegramClient } from "telegram";
import { StringSession } from "telegram/sessions/index.js";
import type { BotFatherConfigType } from "../types.ts";
import { BOTFATHER_USERNAME, type BotFatherSession, type BotFatherSessionFactory } from "./automation.ts";

export class GramjsSession implements BotFatherSession {
  constructor(private readonly client: TelegramClient) {}

  async sendMessage(text: string) {
    await this.client.sendMessage(BOTFATHER_USERNAME, { message: text });
  }

  async getRecentMessages(limit: number) {
    const messages = await this.client.getMessages(BOTFATHER_USERNAME, { limit });
    return messages.map((m) => m.message).filter((text) => Boolean(text));
  }

  async close() {
    await this.client.disconnect();
  }
}

/** Opens a fresh user-account connection per conversation, using a saved string session. */
export function gramjsSessionFactory(config: BotFatherConfigType): BotFatherSessionFactory {
  return async () => {
    const client = new TelegramClient(
      new StringSession(config.session || ""),
      config.api_id || 0,
      config.api_hash || "",
      { connectionRetries: 3 },
    );
    await client.connect();
    if (!(await client.checkAuthorization())) {
      await client.disconnect();
      throw new Error("BotFather session is not authorized, run botfatherLogin first");
    }
    return new GramjsSession(client);
  };
}
