import fs from "fs";
import path from "path";
import type { LogLevel } from "./types.ts";

const levelWeight: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let minLevel: LogLevel = "debug";

export function setLogLevel(level: LogLevel | undefined) {
  minLevel = level || "debug";
}

interface LogParams {
  msg: string;
  logLevel?: LogLevel;
  botName?: string;
  userId?: string | number;
  logPath?: string;
}

export function log({ msg, logLevel = "info", botName, userId, logPath }: LogParams) {
  if (levelWeight[logLevel] < levelWeight[minLevel]) return;

  const tzoffset = new Date().getTimezoneOffset() * 60000; //offset in milliseconds
  const timestamp = new Date(Date.now() - tzoffset).toISOString().slice(0, 19).replace("T", " ");
  if (msg.includes("\n")) {
    msg = msg.replace(/\n/g, " ");
  }
  const logLevelStr = logLevel !== "info" ? `[${logLevel.toUpperCase()}] ` : "";
  const botNameStr = botName ? `[${botName}] ` : "";
  const userIdStr = userId ? `[${userId}] ` : "";
  const logMessage = `[${timestamp}] ${logLevelStr}${botNameStr}${userIdStr}${msg}`;

  const filePath = logPath ?? process.env.LOG_PATH ?? "data/botmother.log";
  if (filePath) {
    ensureDirectoryExists(filePath);
    fs.appendFileSync(path.resolve(filePath), logMessage + "\n");
  }

  switch (logLevel) {
    case "debug":
      console.debug(logMessage);
      break;
    case "info":
      console.info(logMessage);
      break;
    case "warn":
      console.warn(logMessage);
      break;
    case "error":
      console.error(logMessage);
      break;
  }
}

export function ensureDirectoryExists(filePath: string) {
  const directory = path.dirname(filePath);
  if (!fs.existsSync(directory)) {
    fs.mkdirSync(directory, { recursive: true });
  }
}

export function maskToken(token: string) {
  return `${token.slice(0, 10)}...`;
}

export function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}
