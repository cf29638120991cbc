import { pino } from "pino";

export type { Logger } from "pino";

export const logger = pino({
  name: "mirrorbook",
  level: process.env.LOG_LEVEL ?? "info",
  timestamp: pino.stdTimeFunctions.isoTime,
});
