// CHANGE: Programmatic entry for the room ledger
// WHY: Reads the ledger flags (--max-cost, --warn-id-length, --log-level) and opens a session on stdin/stdout
// REF: REQ-ROOM-CLI, REQ-ROOM-CONFIG
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value without terminating the process
// COMPLEXITY: O(1)

import { runLedger } from "./app/runSession.js";
import type { ExitCode } from "./core/models.js";
import { parseCLIArgs } from "./shell/config/index.js";

/**
 * Runs one ledger session configured from `process.argv`.
 *
 * @returns 0 once the user picks "0. Exit" or stdin ends
 */
export async function main(): Promise<ExitCode> {
	const cliOptions = parseCLIArgs();
	return runLedger(cliOptions);
}
