import pino from "pino";

const defaultLevel =
  process.env.NODE_ENV === "production" ? "info" : "debug";

export const logger = pino({
  name: "disclosure-sync",
  level: process.env.LOG_LEVEL ?? defaultLevel,
});

export type { Logger } from "pino";
