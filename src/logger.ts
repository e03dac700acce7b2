import type { LogLevel } from "./types";
import { Settings } from "./config";

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const SENSITIVE_KEYS = ["seed", "secretKey", "key", "ciphertext", "plaintext"];

function enabled(level: LogLevel): boolean {
  return LEVELS[level] >= LEVELS[Settings.get().logLevel];
}

function scrub(data?: Record<string, unknown>) {
  if (!data) return "";
  const safeData = { ...data };
  // Never log key material or blob contents
  SENSITIVE_KEYS.forEach((key) => delete safeData[key]);
  return safeData;
}

export class Logger {
  static debug(component: string, message: string, data?: Record<string, unknown>) {
    if (!enabled("debug")) return;
    console.debug(`[${component}] ${message}`, scrub(data));
  }

  static log(component: string, message: string, data?: Record<string, unknown>) {
    if (!enabled("info")) return;
    console.log(`[${component}] ${message}`, scrub(data));
  }

  static error(component: string, message: string, error?: unknown) {
    if (!enabled("error")) return;
    console.error(`[${component}] ERROR: ${message}`, error ?? "");
  }

  static warn(component: string, message: string, data?: Record<string, unknown>) {
    if (!enabled("warn")) return;
    console.warn(`[${component}] WARN: ${message}`, scrub(data));
  }
}
