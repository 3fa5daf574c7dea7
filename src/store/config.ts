import { Config, LogLevel } from "effect";

/**
 * @since 1.0.0
 * @category config
 */
export const label = Config.string("ROOTED_STATE_LABEL").pipe(
  Config.withDefault("default")
);

/**
 * Level of the summary line every sweep writes.
 *
 * @since 1.0.0
 * @category config
 */
export const logLevel = Config.logLevel("ROOTED_STATE_LOG_LEVEL").pipe(
  Config.withDefault(LogLevel.Debug)
);

/**
 * @since 1.0.0
 * @category config
 */
export const StoreConfig = Config.all({ label, sweepLogLevel: logLevel });
