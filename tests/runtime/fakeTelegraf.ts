import { jest } from "@jest/globals";
import type { Telegraf } from "telegraf";

export type FakeTelegraf = ReturnType<typeof createFakeTelegraf>;

export function createFakeTelegraf(username = "test_bot") {
  let finish: () => void = () => {};
  let fail: (error: Error) => void = () => {};
  return {
    botInfo: { username },
    start: jest.fn(),
    help: jest.fn(),
    command: jest.fn(),
    on: jest.fn(),
    catch: jest.fn(),
    launch: jest.fn((_config: unknown, onLaunch?: () => void) => {
      onLaunch?.();
      return new Promise<void>((resolve, reject) => {
        finish = resolve;
        fail = reject;
      });
    }),
    stop: jest.fn((_reason?: string) => finish()),
    // polling fails after launch, like a revoked token
    crash: (error: Error) => fail(error),
    telegram: {
      setMyCommands: jest.fn(async (_commands: unknown) => true),
      getMe: jest.fn(async () => ({ username })),
      sendMessage: jest.fn(async () => ({})),
    },
  };
}

export function asTelegraf(fake: FakeTelegraf) {
  return () => fake as unknown as Telegraf;
}
