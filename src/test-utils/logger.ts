import { Effect, Logger, LogLevel } from "effect";

export interface LogLine {
  readonly level: string;
  readonly message: string;
  readonly annotations: Record<string, unknown>;
}

const render = (message: unknown) =>
  Array.isArray(message) ? message.map(String).join(" ") : String(message);

/**
 * Collects every log line in memory instead of printing it.
 */
export const makeTestLogger = () => {
  const lines: Array<LogLine> = [];
  const logger = Logger.make(({ logLevel, message, annotations }) => {
    lines.push({
      level: logLevel.label,
      message: render(message),
      annotations: Object.fromEntries(annotations),
    });
  });

  return {
    lines,
    capture: <A, E, R>(effect: Effect.Effect<A, E, R>) =>
      effect.pipe(
        Effect.provide(Logger.replace(Logger.defaultLogger, logger)),
        Logger.withMinimumLogLevel(LogLevel.All)
      ),
  };
};
