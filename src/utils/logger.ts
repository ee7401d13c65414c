import pino from "pino";

const testing = process.env.NODE_ENV === "test" || !!process.env.VITEST;

export const logger = pino({
  name: "toolhost",
  level: process.env.LOG_LEVEL || (testing ? "silent" : "info"),
});

export function componentLogger(component: string): pino.Logger {
  return logger.child({ component });
}
