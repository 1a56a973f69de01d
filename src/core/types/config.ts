// CHANGE: Configuration types for the room ledger CLI
// REF: REQ-ROOM-CONFIG
// SOURCE: n/a

import type { LogLevel } from "effect";

import { DEFAULT_IDENTIFIER_WARN_LENGTH } from "../registry.js";
import { DEFAULT_MAX_COST } from "../validation.js";

/**
 * Опции командной строки для room-ledger.
 *
 * @property maxCost Верхняя граница базовой стоимости
 * @property identifierWarnLength Длина обозначения, после которой пишется предупреждение
 * @property logLevel Минимальный уровень логирования Effect
 */
export interface CLIOptions {
	readonly maxCost: number;
	readonly identifierWarnLength: number;
	readonly logLevel: LogLevel.Literal;
}

export const DEFAULT_CLI_OPTIONS: CLIOptions = {
	maxCost: DEFAULT_MAX_COST,
	identifierWarnLength: DEFAULT_IDENTIFIER_WARN_LENGTH,
	logLevel: "Warning",
};

export const LOG_LEVEL_LITERALS: ReadonlyArray<LogLevel.Literal> = [
	"All",
	"Trace",
	"Debug",
	"Info",
	"Warning",
	"Error",
	"Fatal",
	"None",
];
