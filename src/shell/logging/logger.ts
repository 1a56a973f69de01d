// CHANGE: Diagnostics logger writing Effect log entries to stderr
// WHY: Warnings are an auxiliary channel; stdout carries only the session dialogue
// REF: REQ-ROOM-LOGGING
// SOURCE: https://effect.website/docs/observability/logging
// PURITY: SHELL
// EFFECT: Layer<never>
// INVARIANT: Entries below the configured level are dropped

import { Layer, Logger, LogLevel } from "effect";

/**
 * Renders a log message; Effect passes several arguments as an array.
 *
 * @pure true
 */
export const renderLogMessage = (message: unknown): string =>
	Array.isArray(message) ? message.map(String).join(" ") : String(message);

export const stderrLogger = Logger.make(({ logLevel, message }) => {
	globalThis.console.error(
		`[${logLevel.label}] ${renderLogMessage(message)}`,
	);
});

/**
 * Replaces the default logger and sets the minimum level.
 *
 * @effect Layer<never>
 */
export const DiagnosticsLoggerLive = (
	level: LogLevel.Literal,
): Layer.Layer<never> =>
	Layer.merge(
		Logger.replace(Logger.defaultLogger, stderrLogger),
		Logger.minimumLogLevel(LogLevel.fromLiteral(level)),
	);
