/**
 * pino 日志工厂 — 每个模块一个具名 logger，级别取自 LOG_LEVEL
 */

import pino from "pino";

export type Logger = pino.Logger;

export function createLogger(name: string): Logger {
  return pino({ name, level: process.env.LOG_LEVEL ?? "info" });
}
