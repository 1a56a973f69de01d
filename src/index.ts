// CHANGE: Public API entry point for library consumers
// WHY: Export APP orchestration, SHELL services and CORE utilities; the BIN layer stays private
// QUOTE(ТЗ): "CORE никогда не вызывает SHELL"; "Functional Core, Imperative Shell"
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or Effect services
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// SESSION (Programmatic Entry Points)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Interactive ledger session.
 *
 * @example
 * ```typescript
 * import { runLedger, DEFAULT_CLI_OPTIONS } from 'room-ledger';
 *
 * const exitCode = await runLedger(DEFAULT_CLI_OPTIONS);
 * ```
 *
 * @pure false - reads stdin, writes stdout/stderr
 * @returns ExitCode (0 = normal end)
 */
export { runLedger, runSession } from "./app/runSession.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES (Immutable Domain Models)
// ═══════════════════════════════════════════════════════════════════════════════

export type { DiscountStrategy } from "./core/discount.js";
export type {
	AddRoomRequest,
	ExitCode,
	Room,
	RoomRegistry,
	RoomRow,
} from "./core/models.js";
export type { CLIOptions } from "./core/types/index.js";
export { DEFAULT_CLI_OPTIONS } from "./core/types/index.js";

/**
 * Typed domain errors (`_tag`-discriminated).
 *
 * @pure true
 */
export {
	DuplicateRoom,
	describeRoomError,
	EmptyRoomList,
	InputClosed,
	InvalidValue,
	type RoomError,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export {
	computeCost,
	makePercentageDiscount,
	noDiscount,
	selectDiscount,
} from "./core/discount.js";
export {
	addRoom,
	averageFinalCost,
	emptyRegistry,
	findRoom,
	listAll,
	registrySize,
} from "./core/registry.js";
export { makeRoom, roomFinalCost } from "./core/room.js";
export {
	parseDiscountPercent,
	parseMenuChoice,
	parseNonEmptyString,
	parsePositiveCost,
} from "./core/validation.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL SERVICES
// ═══════════════════════════════════════════════════════════════════════════════

export {
	RoomLedger,
	RoomLedgerLive,
	type RoomLedgerService,
} from "./shell/ledger/ledger.js";
export {
	Terminal,
	TerminalLive,
	type TerminalService,
	type TerminalStreams,
} from "./shell/terminal/terminal.js";
