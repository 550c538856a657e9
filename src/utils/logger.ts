import pino from "pino";
import { getEnv } from "../config/env.js";

const env = getEnv();

export const SERVICE_NAME = "skincare-ingredient-index";

export const logger = pino({
  name: SERVICE_NAME,
  level: env.LOG_LEVEL,
  base: { service: SERVICE_NAME, searchTerm: env.SNAPKLIK_SEARCH_TERM },
  transport: env.LOG_PRETTY
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "service,searchTerm",
        },
      }
    : undefined,
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
});

export function createChildLogger(context: Record<string, unknown>) {
  return logger.child(context);
}
