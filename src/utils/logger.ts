import pino from "pino";

export function createLogger(level: string = "info", name: string = "canonical-orders") {
  return pino({
    name,
    level,
    transport: {
      target: "pino/file",
      options: { destination: 1 }, // stdout
    },
  });
}

export type Logger = ReturnType<typeof createLogger>;

/**
 * A logger that drops everything. Used where a caller does not supply one.
 */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
