import pino, { type LevelWithSilent, type Logger as PinoLogger } from "pino";

export type Logger = PinoLogger;

/**
 * Create the run logger. No transport, so nothing spawns worker threads.
 */
export function createLogger(level: LevelWithSilent = "info"): Logger {
  return pino({
    level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/** Logger that drops everything; handy for tests and library callers */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
