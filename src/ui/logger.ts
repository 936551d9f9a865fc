import fs from "node:fs";
import process from "node:process";
import { COLOR_CODES, ENABLE_COLOR, type ColorCode } from "../config/constants.js";

type Level = "debug" | "info" | "warn" | "error";

let logStream: fs.WriteStream | undefined;
let logStreamOpened = false;

// Opened on first write so that importing this module has no side effects.
function logFile(): fs.WriteStream | undefined {
  if (!logStreamOpened) {
    logStreamOpened = true;
    const target = process.env["LOG_FILE"];
    if (target) {
      logStream = fs.createWriteStream(target, { flags: "a" });
    }
  }
  return logStream;
}

function writeToLogFile(level: Level, message: string): void {
  logFile()?.write(`[${new Date().toISOString()}] ${level.toUpperCase()} ${message}\n`);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function colorize(message: string, color: ColorCode | undefined): string {
  if (!ENABLE_COLOR || !color) {
    return message;
  }
  return `${color}${message}${COLOR_CODES.reset}`;
}

export interface Logger {
  (message: string, ...rest: unknown[]): void;
}

interface Channel {
  level: Level;
  method: "log" | "warn" | "error";
  color: ColorCode | undefined;
  /** Only printed with --debug; always written to LOG_FILE. */
  debugOnly: boolean;
}

const CHANNELS = {
  stageLog: { level: "debug", method: "log", color: COLOR_CODES.toHuman, debugOnly: true },
  stageWarn: { level: "warn", method: "warn", color: COLOR_CODES.warn, debugOnly: false },
  stageError: { level: "error", method: "error", color: COLOR_CODES.error, debugOnly: false },
  toLLMLog: { level: "debug", method: "log", color: COLOR_CODES.toLLM, debugOnly: true },
  fromLLMLog: { level: "debug", method: "log", color: COLOR_CODES.fromLLM, debugOnly: true },
  userLog: { level: "info", method: "log", color: undefined, debugOnly: false },
} satisfies Record<string, Channel>;

export type Loggers = Record<keyof typeof CHANNELS, Logger>;

export function makeLogger(channel: Channel, debugMode: boolean): Logger {
  const visible = !channel.debugOnly || debugMode;

  return (message: string, ...rest: unknown[]): void => {
    writeToLogFile(channel.level, rest.length > 0 ? `${message} ${rest.join(" ")}` : message);
    if (visible) {
      console[channel.method](colorize(message, channel.color), ...rest);
    }
  };
}

export function createLoggers(debugMode: boolean): Loggers {
  return {
    stageLog: makeLogger(CHANNELS.stageLog, debugMode),
    stageWarn: makeLogger(CHANNELS.stageWarn, debugMode),
    stageError: makeLogger(CHANNELS.stageError, debugMode),
    toLLMLog: makeLogger(CHANNELS.toLLMLog, debugMode),
    fromLLMLog: makeLogger(CHANNELS.fromLLMLog, debugMode),
    userLog: makeLogger(CHANNELS.userLog, debugMode),
  };
}

/** Loggers that drop everything. */
export function createSilentLoggers(): Loggers {
  const silent: Logger = () => {};
  return {
    stageLog: silent,
    stageWarn: silent,
    stageError: silent,
    toLLMLog: silent,
    fromLLMLog: silent,
    userLog: silent,
  };
}
