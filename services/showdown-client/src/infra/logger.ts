import pino from "pino";

// stdout is reserved for the JSON result record, so logs go to stderr.
export function createLogger(level: pino.LevelWithSilent) {
  return pino(
    {
      level,
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2)
  );
}
