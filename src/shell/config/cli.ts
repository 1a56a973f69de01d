// CHANGE: CLI argument parsing for the ledger session
// WHY: Flags are the only configuration surface (no env vars, no config files)
// REF: REQ-ROOM-CONFIG
// SOURCE: n/a

import {
	type CLIOptions,
	DEFAULT_CLI_OPTIONS,
	LOG_LEVEL_LITERALS,
} from "../../core/types/index.js";

interface ArgProcessResult {
	readonly options: CLIOptions;
	readonly skipNext: boolean;
}

// CHANGE: Flag handlers keyed by flag name
// WHY: Keeps processArgument free of per-flag branching
// QUOTE(LINT): "Function has a complexity of 10. Maximum allowed is 8"
// REF: ESLint complexity
type FlagHandler = (
	value: string | undefined,
	current: CLIOptions,
) => ArgProcessResult;

/**
 * A following flag is never taken as the value of the current one.
 */
const isFlagValue = (value: string | undefined): value is string =>
	value !== undefined && !value.startsWith("--");

/**
 * Handler for a flag taking a positive number; a bad or missing value keeps the current option.
 */
function createPositiveNumberHandler(
	key: "maxCost" | "identifierWarnLength",
): FlagHandler {
	return (value, current) => {
		if (!isFlagValue(value)) return { options: current, skipNext: false };
		const parsed = Number(value);
		const options =
			Number.isFinite(parsed) && parsed > 0
				? { ...current, [key]: parsed }
				: current;
		return { options, skipNext: true };
	};
}

const logLevelHandler: FlagHandler = (value, current) => {
	if (!isFlagValue(value)) return { options: current, skipNext: false };
	const level = LOG_LEVEL_LITERALS.find(
		(literal) => literal.toLowerCase() === value.toLowerCase(),
	);
	return {
		options: level === undefined ? current : { ...current, logLevel: level },
		skipNext: true,
	};
};

const flagHandlers: Readonly<Record<string, FlagHandler | undefined>> = {
	"--max-cost": createPositiveNumberHandler("maxCost"),
	"--warn-id-length": createPositiveNumberHandler("identifierWarnLength"),
	"--log-level": logLevelHandler,
};

function processArgument(
	arg: string,
	next: string | undefined,
	current: CLIOptions,
): ArgProcessResult {
	const handler = flagHandlers[arg];
	if (handler !== undefined) {
		return handler(next, current);
	}
	// Unknown flags and positionals are ignored
	return { options: current, skipNext: false };
}

/**
 * Парсит аргументы командной строки.
 *
 * @param args Аргументы без `node` и пути к скрипту
 * @returns Опции командной строки; неизвестные флаги игнорируются
 *
 * @example
 * ```ts
 * // Command: room-ledger --max-cost 5000 --log-level debug
 * const options = parseCLIArgs();
 * // Returns: { maxCost: 5000, identifierWarnLength: 50, logLevel: "Debug" }
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): CLIOptions {
	let options = DEFAULT_CLI_OPTIONS;

	for (let i = 0; i < args.length; i++) {
		const arg: string = args.at(i) ?? "";
		if (arg.length === 0) continue;

		const result = processArgument(arg, args.at(i + 1), options);
		options = result.options;
		if (result.skipNext) {
			i++;
		}
	}

	return options;
}
