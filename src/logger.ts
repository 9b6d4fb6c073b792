import pino from "pino";

const defaultLevel = process.env.NODE_ENV === "test" ? "silent" : "info";

export const logger = pino(
  {
    name: "claude-desktop-fedora",
    level: process.env.LOG_LEVEL ?? defaultLevel,
  },
  pino.destination(2),
);
