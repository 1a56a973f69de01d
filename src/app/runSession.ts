// CHANGE: Application layer — the interactive menu session
// WHY: APP composes CORE (parsing, formatting, menu model) with SHELL services (terminal, ledger)
// QUOTE(ТЗ): "FUNCTIONAL CORE, IMPERATIVE SHELL"; "CORE никогда не вызывает SHELL"
// REF: REQ-ROOM-CLI
// PURITY: APP (no process.exit here)
// EFFECT: Effect<ExitCode, never, Terminal | RoomLedger>
// INVARIANT: A domain error or defect inside an action never ends the session
// COMPLEXITY: O(k · n) where k = menu iterations, n = rooms

import { Effect, Layer, Option } from "effect";
import { match } from "ts-pattern";

import {
	describeRoomError,
	type InputClosed,
	type RoomError,
} from "../core/errors.js";
import { formatAverage, formatRoomTable } from "../core/format/report.js";
import {
	MENU_HIGH,
	MENU_LINES,
	MENU_LOW,
	type MenuAction,
	menuActionOf,
	PROMPTS,
} from "../core/menu.js";
import type { ExitCode } from "../core/models.js";
import type { CLIOptions } from "../core/types/index.js";
import {
	promptDiscountPercent,
	promptMenuChoice,
	promptNonEmptyString,
	promptPositiveCost,
} from "../shell/input/prompts.js";
import { RoomLedger, RoomLedgerLive } from "../shell/ledger/ledger.js";
import { DiagnosticsLoggerLive } from "../shell/logging/logger.js";
import {
	Terminal,
	TerminalLive,
	type TerminalStreams,
} from "../shell/terminal/terminal.js";

type Step = "continue" | "exit";

const initialStep: Step = "continue";
const normalExit: ExitCode = 0;

const reportRoomError = (error: RoomError) =>
	Effect.flatMap(Terminal, (terminal) =>
		terminal.writeLine(`Error: ${describeRoomError(error)}`),
	);

/**
 * Collects the three fields and adds the room.
 *
 * @effect Effect<void, InputClosed | RoomError, Terminal | RoomLedger>
 */
const addRoomAction = (options: CLIOptions) =>
	Effect.gen(function* () {
		const terminal = yield* Terminal;
		const ledger = yield* RoomLedger;
		const identifier = yield* promptNonEmptyString(PROMPTS.identifier);
		const baseCost = yield* promptPositiveCost(
			PROMPTS.baseCost,
			options.maxCost,
		);
		const discount = yield* promptDiscountPercent(PROMPTS.discount);
		yield* ledger.addRoom(identifier, baseCost, discount);
		yield* terminal.writeLine("Room added.");
	});

const listRoomsAction = Effect.gen(function* () {
	const terminal = yield* Terminal;
	const ledger = yield* RoomLedger;
	const rows = yield* ledger.listAll;
	yield* Effect.forEach(formatRoomTable(rows), (line) =>
		terminal.writeLine(line),
	);
});

const averageCostAction = Effect.gen(function* () {
	const terminal = yield* Terminal;
	const ledger = yield* RoomLedger;
	const average = yield* ledger.averageFinalCost;
	yield* terminal.writeLine(formatAverage(average));
});

const actionEffect = (
	action: MenuAction,
	options: CLIOptions,
): Effect.Effect<void, InputClosed | RoomError, Terminal | RoomLedger> =>
	match(action)
		.with({ _tag: "AddRoom" }, () => addRoomAction(options))
		.with({ _tag: "ListRooms" }, () => listRoomsAction)
		.with({ _tag: "AverageCost" }, () => averageCostAction)
		.with({ _tag: "Exit" }, () =>
			Effect.flatMap(Terminal, (terminal) => terminal.writeLine("Goodbye.")),
		)
		.exhaustive();

const describeDefect = (defect: unknown): string =>
	defect instanceof Error ? defect.message : String(defect);

/**
 * Runs one menu action. Domain errors and defects are reported here; only
 * InputClosed escapes.
 */
const runAction = (
	action: MenuAction,
	options: CLIOptions,
): Effect.Effect<Step, InputClosed, Terminal | RoomLedger> => {
	const next: Step = action._tag === "Exit" ? "exit" : "continue";
	return actionEffect(action, options).pipe(
		Effect.catchTags({
			InvalidValue: reportRoomError,
			DuplicateRoom: reportRoomError,
			EmptyRoomList: reportRoomError,
		}),
		Effect.catchAllDefect((defect) =>
			Effect.flatMap(Terminal, (terminal) =>
				terminal.writeLine(`Unexpected error: ${describeDefect(defect)}`),
			),
		),
		Effect.as(next),
	);
};

/**
 * One iteration: show the menu, read a choice, run it.
 */
const menuStep = (options: CLIOptions) =>
	Effect.gen(function* () {
		const terminal = yield* Terminal;
		yield* Effect.forEach(MENU_LINES, (line) => terminal.writeLine(line));
		const choice = yield* promptMenuChoice(PROMPTS.choice, MENU_LOW, MENU_HIGH);
		const action = menuActionOf(choice);
		if (Option.isNone(action)) {
			return "continue" satisfies Step;
		}
		return yield* runAction(action.value, options);
	});

/**
 * Interactive session against the provided Terminal and RoomLedger.
 *
 * @returns 0 when the user exits or input ends
 *
 * @pure false (terminal I/O)
 * @effect Effect<ExitCode, never, Terminal | RoomLedger>
 * @invariant ExitCode = 0 for every normal termination
 */
export const runSession = (
	options: CLIOptions,
): Effect.Effect<ExitCode, never, Terminal | RoomLedger> =>
	Effect.iterate(initialStep, {
		while: (step) => step === "continue",
		body: () =>
			menuStep(options).pipe(
				Effect.catchTag("InputClosed", () =>
					Effect.succeed<Step>("exit"),
				),
			),
	}).pipe(Effect.as(normalExit));

/**
 * Runs a session with the configured logger, on stdin/stdout unless other
 * streams are given.
 *
 * @pure false
 * @effect Promise<ExitCode>
 */
export function runLedger(
	options: CLIOptions,
	streams?: TerminalStreams,
): Promise<ExitCode> {
	const services = Layer.mergeAll(
		TerminalLive(streams),
		RoomLedgerLive({ identifierWarnLength: options.identifierWarnLength }),
		DiagnosticsLoggerLive(options.logLevel),
	);
	return Effect.runPromise(Effect.provide(runSession(options), services));
}
