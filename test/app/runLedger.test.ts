// CHANGE: runLedger wiring (readline terminal, ledger, stderr logger) over in-process streams
// PURITY: APP - no stdin/stdout; console.error is spied
// INVARIANT: A scripted session over real layers ends with exit code 0

import { describe, expect, it, vi } from "vitest";

import { runLedger } from "../../src/app/runSession.js";
import { DEFAULT_CLI_OPTIONS } from "../../src/core/types/index.js";
import { collectingOutput, endedInput } from "../utils/streams.js";

describe("runLedger", () => {
	it("adds a room, averages it and exits on 0", async () => {
		vi.spyOn(console, "error").mockImplementation(() => undefined);
		const output = collectingOutput();

		const exitCode = await runLedger(DEFAULT_CLI_OPTIONS, {
			input: endedInput("1\n101\n500\n10\n3\n0\n"),
			output: output.stream,
		});

		expect(exitCode).toBe(0);
		expect(output.text()).toContain(
			"Discount percent (0 for none, < 100): Room added.\n",
		);
		expect(output.text()).toContain(
			"Your choice: Average cost (after discounts): 450.00\n",
		);
		expect(output.text().endsWith("Your choice: Goodbye.\n")).toBe(true);
	});

	it("ends with exit code 0 when input runs out mid-menu", async () => {
		const output = collectingOutput();

		const exitCode = await runLedger(DEFAULT_CLI_OPTIONS, {
			input: endedInput("2\n"),
			output: output.stream,
		});

		expect(exitCode).toBe(0);
		expect(output.text()).toContain(
			"Your choice: The room list is empty.\n",
		);
	});

	it("sends the long-identifier warning to stderr through the configured logger", async () => {
		const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);

		await runLedger(
			{ ...DEFAULT_CLI_OPTIONS, identifierWarnLength: 3 },
			{ input: endedInput("1\nABCDE\n100\n0\n0\n"), output: collectingOutput().stream },
		);

		expect(spy).toHaveBeenCalledWith(
			"[WARN] room identifier is longer than 3 characters",
		);
	});
});
