import pino from "pino";

const defaultLevel = (): string => {
  if (process.env.NODE_ENV === "production") {
    return "info";
  }

  return process.env.NODE_ENV === "test" ? "silent" : "debug";
};

export const logger = pino({
  name: "company-news-sentiment",
  level: process.env.LOG_LEVEL ?? defaultLevel(),
});
